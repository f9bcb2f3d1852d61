/**
 * @fileoverview Location Passes Interfaces
 *
 * Wide, one-row-per-location shape handed to the map presenter.
 */

import { FailedLocation } from './prediction-row.interface';

/**
 * A rise time in both lossless and display form.
 */
export interface PassTime {
    /** Seconds since the Unix epoch, as received. */
    risetime: number;
    /** ISO-8601 instant in UTC, e.g. `2023-11-14T22:13:20Z`. */
    at: string;
    /** `YYYY-MM-DD HH:mm:ss <zone>` in the display time zone. */
    display: string;
}

export interface LocationPasses {
    location_id: string;
    display_name: string;
    latitude: number;
    longitude: number;
    first: PassTime | null;
    second: PassTime | null;
    third: PassTime | null;
}

export interface PassesReport {
    generatedAt: string;
    /** Locations the run attempted. */
    requested: number;
    succeeded: number;
    failed: FailedLocation[];
    /** Sorted by `first`, soonest pass first. */
    passes: LocationPasses[];
}
