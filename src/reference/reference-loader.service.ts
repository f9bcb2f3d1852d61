/**
 * @fileoverview Reference Loader Service
 *
 * Loads the capital reference tables and joins them on region id.
 *
 * @remarks
 * - Left side of the join is the coordinates table; its order is kept
 * - Sentinel/aggregate ids (REFERENCE_EXCLUDED_IDS) are dropped from both sides
 * - Any retrieval or parse failure is fatal for the run
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Counter } from 'prom-client';
import { z } from 'zod';
import { HttpClientProvider } from '../shared/http';
import { ReferenceResource, ResourceUnavailableError } from '../shared/errors';
import { parseDelimitedTable, TableRow } from './delimited-text';
import { Location } from './interfaces';

const loadCounter = new Counter({
    name: 'reference_loads_total',
    help: 'Total number of reference table loads',
    labelNames: ['status'],
});

const nonEmpty = z.string().trim().min(1);

const CoordinateRowSchema = z.object({
    id: nonEmpty,
    latitude: nonEmpty.pipe(z.coerce.number().min(-90).max(90)),
    longitude: nonEmpty.pipe(z.coerce.number().min(-180).max(180)),
});

const CapitalRowSchema = z.object({
    id: nonEmpty,
    display_name: nonEmpty,
});

const COLUMNS: Record<ReferenceResource, readonly string[]> = {
    coordinates: ['id', 'latitude', 'longitude'],
    capitals: ['id', 'display_name'],
};

@Injectable()
export class ReferenceLoaderService {
    private readonly logger = new Logger(ReferenceLoaderService.name);

    constructor(
        private httpClientProvider: HttpClientProvider,
        private configService: ConfigService,
    ) { }

    /**
     * Fetches both tables and returns the joined locations.
     *
     * @throws ResourceUnavailableError when either table cannot be fetched or parsed
     */
    async load(): Promise<Location[]> {
        const excluded = new Set(this.configService.get<string[]>('REFERENCE_EXCLUDED_IDS') ?? []);

        try {
            const coordinates = this.validate(
                'coordinates',
                await this.fetchTable('coordinates', excluded),
                CoordinateRowSchema,
            );
            const capitals = this.validate(
                'capitals',
                await this.fetchTable('capitals', excluded),
                CapitalRowSchema,
            );
            const namesById = new Map(capitals.map((row) => [row.id, row.display_name]));

            const locations: Location[] = [];
            const unnamed: string[] = [];

            for (const row of coordinates) {
                const displayName = namesById.get(row.id);
                if (displayName === undefined) {
                    unnamed.push(row.id);
                    continue;
                }

                locations.push(Object.freeze({
                    id: row.id,
                    display_name: displayName,
                    latitude: row.latitude,
                    longitude: row.longitude,
                }));
            }

            if (unnamed.length > 0) {
                this.logger.warn({ msg: 'Locations without display name dropped', ids: unnamed });
            }

            loadCounter.inc({ status: 'success' });
            this.logger.log({ msg: 'Reference tables loaded', locations: locations.length, excluded: [...excluded] });
            return locations;
        } catch (error) {
            loadCounter.inc({ status: 'error' });
            this.logger.error({ msg: 'Reference load failed', error });
            throw error;
        }
    }

    private async fetchTable(resource: ReferenceResource, excluded: ReadonlySet<string>): Promise<TableRow[]> {
        const url = this.urlFor(resource);
        let body: unknown;

        try {
            const response = await this.httpClientProvider.getClient().get<string>(url, {
                responseType: 'text',
            });
            body = response.data;
        } catch (error) {
            throw new ResourceUnavailableError(resource, url, error instanceof Error ? error.message : String(error));
        }

        if (typeof body !== 'string') {
            throw new ResourceUnavailableError(resource, url, 'response body is not text');
        }

        try {
            // Sentinel rows may be short (e.g. "US" alone), so they go before the width check.
            return parseDelimitedTable(body, COLUMNS[resource], { skip: { column: 'id', values: excluded } });
        } catch (error) {
            throw new ResourceUnavailableError(resource, url, error instanceof Error ? error.message : String(error));
        }
    }

    /**
     * Validates parsed rows and enforces id uniqueness.
     */
    private validate<T extends { id: string }>(
        resource: ReferenceResource,
        rows: TableRow[],
        schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    ): T[] {
        const url = this.urlFor(resource);
        const seen = new Set<string>();

        return rows.map((row, index) => {
            const result = schema.safeParse(row);
            if (!result.success) {
                const detail = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
                throw new ResourceUnavailableError(resource, url, `row ${index + 1}: ${detail}`);
            }
            if (seen.has(result.data.id)) {
                throw new ResourceUnavailableError(resource, url, `duplicate id "${result.data.id}"`);
            }
            seen.add(result.data.id);
            return result.data;
        });
    }

    private urlFor(resource: ReferenceResource): string {
        const key = resource === 'coordinates' ? 'COORDINATES_URL' : 'CAPITALS_URL';
        return this.configService.get<string>(key) ?? '';
    }
}
