/**
 * @fileoverview Passes Service
 *
 * Runs the whole pipeline once: load reference tables, fetch predictions
 * sequentially, reshape into the wide table.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Counter } from 'prom-client';
import { ReferenceLoaderService } from '../reference/reference-loader.service';
import { FetchOrchestratorService } from './fetch-orchestrator.service';
import { PassesReport } from './interfaces';
import { reshapePasses } from './reshaper';

const runCounter = new Counter({
    name: 'pass_runs_total',
    help: 'Total number of pass pipeline runs',
    labelNames: ['status'],
});

const failedLocationsCounter = new Counter({
    name: 'pass_run_locations_failed_total',
    help: 'Locations skipped because their prediction failed',
});

@Injectable()
export class PassesService {
    private readonly logger = new Logger(PassesService.name);

    constructor(
        private referenceLoader: ReferenceLoaderService,
        private orchestrator: FetchOrchestratorService,
        private configService: ConfigService,
    ) { }

    /**
     * @throws ResourceUnavailableError when the reference tables cannot be loaded
     */
    async run(): Promise<PassesReport> {
        const startTime = Date.now();

        try {
            const locations = await this.referenceLoader.load();
            const { rows, failed } = await this.orchestrator.fetchAll(locations);
            const passes = reshapePasses(rows, {
                timeZone: this.configService.get<string>('DISPLAY_TIMEZONE') ?? 'UTC',
            });

            runCounter.inc({ status: 'success' });
            failedLocationsCounter.inc(failed.length);

            const report: PassesReport = {
                generatedAt: new Date().toISOString(),
                requested: locations.length,
                succeeded: locations.length - failed.length,
                failed,
                passes,
            };

            this.logger.log({
                msg: 'Pass run completed',
                requested: report.requested,
                succeeded: report.succeeded,
                failed: failed.length,
                mapped: passes.length,
                durationMs: Date.now() - startTime,
            });

            return report;
        } catch (error) {
            runCounter.inc({ status: 'error' });
            this.logger.error({ msg: 'Pass run failed', error });
            throw error;
        }
    }
}
