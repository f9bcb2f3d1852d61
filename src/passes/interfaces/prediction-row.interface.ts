/**
 * @fileoverview Prediction Row Interfaces
 *
 * Flat output of the fetch loop, one row per kept (location, rank) pair.
 */

import { RankedPass } from '../../predictions/interfaces';
import { PredictionUnavailableError } from '../../shared/errors';

export interface PredictionRow {
    location_id: string;
    display_name: string;
    latitude: number;
    longitude: number;
    rank: number;
    /** Seconds since the Unix epoch. */
    risetime: number;
}

/**
 * Per-location result of one prediction call.
 */
export type PredictionOutcome =
    | { ok: true; passes: RankedPass[] }
    | { ok: false; error: PredictionUnavailableError };

export interface FailedLocation {
    location_id: string;
    display_name: string;
    reason: string;
}

export interface FetchRun {
    /** Location order, then rank order. */
    rows: PredictionRow[];
    /** Keyed by location id, in call order. */
    outcomes: Map<string, PredictionOutcome>;
    failed: FailedLocation[];
}
