/**
 * @fileoverview Fetch Orchestrator Service
 *
 * Calls the prediction service once per location, strictly one at a time.
 *
 * @remarks
 * A failed location is recorded and skipped; the loop always continues.
 * Only the first PASSES_PER_LOCATION predictions of each location are kept.
 */

import { Injectable, Logger } from '@nestjs/common';
import { PassTimeClient } from '../predictions/pass-time.client';
import { Location } from '../reference/interfaces';
import { toPredictionError } from '../shared/errors';
import { FailedLocation, FetchRun, PredictionOutcome, PredictionRow } from './interfaces';

export const PASSES_PER_LOCATION = 3;

@Injectable()
export class FetchOrchestratorService {
    private readonly logger = new Logger(FetchOrchestratorService.name);

    constructor(private passTimeClient: PassTimeClient) { }

    async fetchAll(locations: readonly Location[]): Promise<FetchRun> {
        const outcomes = new Map<string, PredictionOutcome>();
        const rows: PredictionRow[] = [];
        const failed: FailedLocation[] = [];

        for (const location of locations) {
            const outcome = await this.fetchOne(location);
            outcomes.set(location.id, outcome);

            if (!outcome.ok) {
                failed.push({
                    location_id: location.id,
                    display_name: location.display_name,
                    reason: outcome.error.message,
                });
                this.logger.warn({
                    msg: 'Prediction failed, location skipped',
                    location_id: location.id,
                    error: outcome.error.name,
                    reason: outcome.error.message,
                });
                continue;
            }

            for (const pass of outcome.passes.slice(0, PASSES_PER_LOCATION)) {
                rows.push({
                    location_id: location.id,
                    display_name: location.display_name,
                    latitude: location.latitude,
                    longitude: location.longitude,
                    rank: pass.rank,
                    risetime: pass.risetime,
                });
            }
        }

        this.logger.log({
            msg: 'Prediction fetch completed',
            locations: locations.length,
            failed: failed.length,
            rows: rows.length,
        });

        return { rows, outcomes, failed };
    }

    private async fetchOne(location: Location): Promise<PredictionOutcome> {
        try {
            const passes = await this.passTimeClient.predict(location.latitude, location.longitude);
            return { ok: true, passes };
        } catch (error) {
            return { ok: false, error: toPredictionError(error, location.latitude, location.longitude) };
        }
    }
}
