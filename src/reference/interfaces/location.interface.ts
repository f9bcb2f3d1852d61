/**
 * @fileoverview Location Interface
 *
 * A named point from the reference tables (a state capital).
 */

/**
 * Reference location, immutable once loaded.
 */
export interface Location {
    /** Region code, e.g. `CA`. Unique within a load. */
    readonly id: string;
    /** Capital name shown on the map, e.g. `Sacramento`. */
    readonly display_name: string;
    readonly latitude: number;
    readonly longitude: number;
}
