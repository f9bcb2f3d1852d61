/**
 * @fileoverview Ranked Pass Interface
 */

/**
 * One upcoming pass as returned by the prediction service.
 */
export interface RankedPass {
    /** 1-based position in the service's response. */
    rank: number;
    /** Rise time in seconds since the Unix epoch. */
    risetime: number;
    riseTime: Date;
    durationSeconds?: number;
}
