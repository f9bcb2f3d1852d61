/**
 * @fileoverview Pipeline Errors
 *
 * Failure taxonomy for the pass-time pipeline.
 *
 * @remarks
 * - ResourceUnavailableError aborts a run (no locations, nothing to fetch)
 * - PredictionUnavailableError / MalformedResponseError degrade one location only
 */

import { ServiceUnavailableException } from '@nestjs/common';

export type ReferenceResource = 'coordinates' | 'capitals';

/**
 * A reference table could not be retrieved or parsed.
 */
export class ResourceUnavailableError extends ServiceUnavailableException {
    constructor(
        readonly resource: ReferenceResource,
        readonly url: string,
        readonly reason: string,
    ) {
        super(`Reference resource "${resource}" unavailable (${url}): ${reason}`);
        this.name = 'ResourceUnavailableError';
    }
}

/**
 * A single prediction call failed: network error, timeout or non-success status.
 */
export class PredictionUnavailableError extends Error {
    constructor(
        message: string,
        readonly latitude: number,
        readonly longitude: number,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = 'PredictionUnavailableError';
    }
}

/**
 * The service answered, but the body is not a list of rise-time predictions.
 */
export class MalformedResponseError extends PredictionUnavailableError {
    constructor(message: string, latitude: number, longitude: number) {
        super(message, latitude, longitude);
        this.name = 'MalformedResponseError';
    }
}

/**
 * Normalizes anything thrown during a prediction call.
 */
export function toPredictionError(error: unknown, latitude: number, longitude: number): PredictionUnavailableError {
    if (error instanceof PredictionUnavailableError) {
        return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new PredictionUnavailableError(message, latitude, longitude, { cause: error });
}
