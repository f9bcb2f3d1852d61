/**
 * @fileoverview Passes Reshaper
 *
 * Pivots flat (location, rank, risetime) rows into one row per location with
 * `first`, `second` and `third` slots, then sorts soonest pass first.
 *
 * Pure: same rows in, same table out.
 */

import { LocationPasses, PassTime, PredictionRow } from './interfaces';

type Slot = 'first' | 'second' | 'third';

const SLOT_BY_RANK: Record<number, Slot | undefined> = {
    1: 'first',
    2: 'second',
    3: 'third',
};

export interface ReshapeOptions {
    /** IANA zone for display strings. Defaults to `UTC`. */
    timeZone?: string;
}

function displayFormatter(timeZone: string): Intl.DateTimeFormat {
    return new Intl.DateTimeFormat('en-US', {
        timeZone,
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
        hour: '2-digit',
        minute: '2-digit',
        second: '2-digit',
        hourCycle: 'h23',
    });
}

function formatWith(formatter: Intl.DateTimeFormat, risetime: number): PassTime {
    const instant = new Date(risetime * 1000);
    const parts = new Map(formatter.formatToParts(instant).map((part) => [part.type, part.value]));
    const { timeZone } = formatter.resolvedOptions();

    return {
        risetime,
        at: instant.toISOString().replace(/\.\d{3}Z$/, 'Z'),
        display: `${parts.get('year')}-${parts.get('month')}-${parts.get('day')} `
            + `${parts.get('hour')}:${parts.get('minute')}:${parts.get('second')} ${timeZone}`,
    };
}

/**
 * Converts an epoch-seconds rise time to its lossless and display forms.
 */
export function formatPassTime(risetime: number, timeZone = 'UTC'): PassTime {
    return formatWith(displayFormatter(timeZone), risetime);
}

/**
 * Builds the wide table.
 *
 * - one row per distinct location_id, in first-seen order before sorting
 * - ranks outside 1..3 are ignored; a repeated rank keeps its first row
 * - missing ranks stay `null`
 * - locations without a rank-1 pass are left out
 * - stable ascending sort on `first.risetime`
 */
export function reshapePasses(rows: readonly PredictionRow[], options: ReshapeOptions = {}): LocationPasses[] {
    const formatter = displayFormatter(options.timeZone ?? 'UTC');
    const byLocation = new Map<string, LocationPasses>();

    for (const row of rows) {
        const slot = SLOT_BY_RANK[row.rank];
        if (!slot) continue;

        let entry = byLocation.get(row.location_id);
        if (!entry) {
            entry = {
                location_id: row.location_id,
                display_name: row.display_name,
                latitude: row.latitude,
                longitude: row.longitude,
                first: null,
                second: null,
                third: null,
            };
            byLocation.set(row.location_id, entry);
        }

        if (entry[slot] === null) {
            entry[slot] = formatWith(formatter, row.risetime);
        }
    }

    return [...byLocation.values()]
        .filter((entry): entry is LocationPasses & { first: PassTime } => entry.first !== null)
        .sort((a, b) => a.first.risetime - b.first.risetime);
}
