#!/usr/bin/env node
/**
 * Runs the pass pipeline once and prints the result.
 *
 * Usage:
 *   fetch-passes            table of capitals, soonest pass first
 *   fetch-passes --geojson  map markers as a GeoJSON FeatureCollection
 */

import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from 'nestjs-pino';
import { AppModule } from '../src/app.module';
import { MapPresenterService, PassesService } from '../src/passes';

async function main(): Promise<void> {
    const asGeoJson = process.argv.includes('--geojson');
    const app = await NestFactory.createApplicationContext(AppModule, { bufferLogs: true });
    app.useLogger(app.get(Logger));

    try {
        const report = await app.get(PassesService).run();

        if (asGeoJson) {
            const collection = app.get(MapPresenterService).toFeatureCollection(report.passes);
            process.stdout.write(`${JSON.stringify(collection, null, 2)}\n`);
            return;
        }

        console.table(report.passes.map((row) => ({
            Capital: row.display_name,
            state: row.location_id,
            first: row.first?.display ?? '',
            second: row.second?.display ?? '',
            third: row.third?.display ?? '',
        })));

        if (report.failed.length > 0) {
            console.log(`Skipped ${report.failed.length} location(s):`);
            for (const failure of report.failed) {
                console.log(`  ${failure.location_id} (${failure.display_name}): ${failure.reason}`);
            }
        }
    } finally {
        await app.close();
    }
}

main().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
});
