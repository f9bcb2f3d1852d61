/**
 * @fileoverview Pass-Time Client
 *
 * Calls the ISS pass prediction service for one coordinate pair.
 *
 * @remarks
 * One GET per call, no retry and no cache. Timeout comes from the shared
 * HTTP client (HTTP_TIMEOUT_MS).
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { isAxiosError } from 'axios';
import { Counter, Histogram } from 'prom-client';
import { z } from 'zod';
import { HttpClientProvider } from '../shared/http';
import { MalformedResponseError, PredictionUnavailableError } from '../shared/errors';
import { RankedPass } from './interfaces';

const predictionCounter = new Counter({
    name: 'iss_prediction_requests_total',
    help: 'Total number of ISS pass prediction requests',
    labelNames: ['status'],
});

const predictionDuration = new Histogram({
    name: 'iss_prediction_duration_seconds',
    help: 'ISS pass prediction request duration',
    buckets: [0.1, 0.25, 0.5, 1, 2, 5, 10],
});

// Service-level refusal, e.g. coordinates out of range
const FailureResponseSchema = z.object({
    message: z.literal('failure'),
    reason: z.string().optional(),
});

// Largest epoch-seconds value a Date can hold (±8.64e15 ms)
const MAX_EPOCH_SECONDS = 8.64e12;

// Only `risetime` is required; other fields are ignored.
const PassResponseSchema = z.object({
    response: z.array(
        z.object({
            risetime: z.number().int().min(-MAX_EPOCH_SECONDS).max(MAX_EPOCH_SECONDS),
            duration: z.number().optional(),
        }),
    ),
});

@Injectable()
export class PassTimeClient {
    private readonly logger = new Logger(PassTimeClient.name);

    constructor(
        private httpClientProvider: HttpClientProvider,
        private configService: ConfigService,
    ) { }

    /**
     * Returns upcoming passes over the given point, in service order.
     *
     * @throws PredictionUnavailableError on network failure, timeout or non-2xx status
     * @throws MalformedResponseError when the body is not a list of rise times
     */
    async predict(latitude: number, longitude: number): Promise<RankedPass[]> {
        const timer = predictionDuration.startTimer();
        const url = this.configService.get<string>('ISS_PASS_API_URL') ?? 'http://api.open-notify.org/iss-pass.json';
        const count = this.configService.get<number>('ISS_PASS_COUNT') ?? 5;

        try {
            let body: unknown;
            try {
                const response = await this.httpClientProvider.getClient().get<unknown>(url, {
                    params: { lat: latitude, lon: longitude, n: count },
                });
                body = response.data;
            } catch (error) {
                throw new PredictionUnavailableError(this.describe(error), latitude, longitude, { cause: error });
            }

            const passes = this.parse(body, latitude, longitude);
            predictionCounter.inc({ status: 'success' });
            this.logger.debug({ msg: 'Prediction received', latitude, longitude, passes: passes.length });
            return passes;
        } catch (error) {
            predictionCounter.inc({ status: error instanceof MalformedResponseError ? 'malformed' : 'error' });
            throw error;
        } finally {
            timer();
        }
    }

    private parse(body: unknown, latitude: number, longitude: number): RankedPass[] {
        const failure = FailureResponseSchema.safeParse(body);
        if (failure.success) {
            throw new PredictionUnavailableError(
                `Prediction service reported failure: ${failure.data.reason ?? 'no reason given'}`,
                latitude,
                longitude,
            );
        }

        const result = PassResponseSchema.safeParse(body);
        if (!result.success) {
            const detail = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
            throw new MalformedResponseError(`Unexpected prediction response: ${detail}`, latitude, longitude);
        }

        return result.data.response.map((pass, index) => ({
            rank: index + 1,
            risetime: pass.risetime,
            riseTime: new Date(pass.risetime * 1000),
            durationSeconds: pass.duration,
        }));
    }

    private describe(error: unknown): string {
        if (isAxiosError(error)) {
            if (error.response) {
                return `Prediction service returned HTTP ${error.response.status}`;
            }
            if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
                return 'Prediction service timed out';
            }
        }
        return error instanceof Error ? error.message : String(error);
    }
}
