/**
 * @fileoverview Fetch Orchestrator Service Tests
 */

import { PassTimeClient } from '../predictions/pass-time.client';
import { RankedPass } from '../predictions/interfaces';
import { Location } from '../reference/interfaces';
import { PredictionUnavailableError } from '../shared/errors';
import { FetchOrchestratorService } from './fetch-orchestrator.service';

describe('FetchOrchestratorService', () => {
    let service: FetchOrchestratorService;
    let predict: jest.Mock<Promise<RankedPass[]>, [number, number]>;

    const locations: Location[] = [
        { id: 'CA', display_name: 'Sacramento', latitude: 38.58, longitude: -121.49 },
        { id: 'TX', display_name: 'Austin', latitude: 30.27, longitude: -97.74 },
        { id: 'UT', display_name: 'Salt Lake City', latitude: 40.76, longitude: -111.89 },
    ];

    const passes = (...risetimes: number[]): RankedPass[] =>
        risetimes.map((risetime, index) => ({
            rank: index + 1,
            risetime,
            riseTime: new Date(risetime * 1000),
        }));

    beforeEach(() => {
        predict = jest.fn<Promise<RankedPass[]>, [number, number]>();
        service = new FetchOrchestratorService({ predict } as unknown as PassTimeClient);
    });

    describe('fetchAll', () => {
        it('should call the client once per location in order', async () => {
            predict.mockResolvedValue(passes(1700000000));

            await service.fetchAll(locations);

            expect(predict.mock.calls).toEqual([
                [38.58, -121.49],
                [30.27, -97.74],
                [40.76, -111.89],
            ]);
        });

        it('should never have two calls in flight', async () => {
            let inFlight = 0;
            let maxInFlight = 0;
            predict.mockImplementation(async () => {
                inFlight++;
                maxInFlight = Math.max(maxInFlight, inFlight);
                await new Promise((resolve) => setTimeout(resolve, 5));
                inFlight--;
                return passes(1700000000);
            });

            await service.fetchAll(locations);

            expect(maxInFlight).toBe(1);
        });

        it('should keep the first three predictions, tagged with the location', async () => {
            predict.mockResolvedValueOnce(passes(1700000000, 1700003600, 1700007200, 1700010800, 1700014400));

            const { rows } = await service.fetchAll(locations.slice(0, 1));

            expect(rows).toEqual([
                {
                    location_id: 'CA',
                    display_name: 'Sacramento',
                    latitude: 38.58,
                    longitude: -121.49,
                    rank: 1,
                    risetime: 1700000000,
                },
                expect.objectContaining({ location_id: 'CA', rank: 2, risetime: 1700003600 }),
                expect.objectContaining({ location_id: 'CA', rank: 3, risetime: 1700007200 }),
            ]);
        });

        it('should order rows by location, then rank', async () => {
            predict
                .mockResolvedValueOnce(passes(1700009000, 1700012000))
                .mockResolvedValueOnce(passes(1700001000))
                .mockResolvedValueOnce(passes(1700005000, 1700008000));

            const { rows } = await service.fetchAll(locations);

            expect(rows.map((row) => [row.location_id, row.rank])).toEqual([
                ['CA', 1],
                ['CA', 2],
                ['TX', 1],
                ['UT', 1],
                ['UT', 2],
            ]);
        });

        it('should skip a failed location and continue with the rest', async () => {
            predict
                .mockResolvedValueOnce(passes(1700000000))
                .mockRejectedValueOnce(new PredictionUnavailableError('Prediction service timed out', 30.27, -97.74))
                .mockResolvedValueOnce(passes(1700000500));

            const run = await service.fetchAll(locations);

            expect(predict).toHaveBeenCalledTimes(3);
            expect(run.rows.map((row) => row.location_id)).toEqual(['CA', 'UT']);
            expect(run.failed).toEqual([
                { location_id: 'TX', display_name: 'Austin', reason: 'Prediction service timed out' },
            ]);
            expect(run.outcomes.get('TX')).toMatchObject({ ok: false });
            expect(run.outcomes.get('CA')).toEqual({ ok: true, passes: passes(1700000000) });
        });

        it('should contain unexpected errors as prediction failures', async () => {
            predict.mockRejectedValueOnce(new TypeError('Cannot read properties of undefined'));

            const run = await service.fetchAll(locations.slice(0, 1));
            const outcome = run.outcomes.get('CA');

            expect(outcome?.ok).toBe(false);
            if (outcome && !outcome.ok) {
                expect(outcome.error).toBeInstanceOf(PredictionUnavailableError);
                expect(outcome.error.cause).toBeInstanceOf(TypeError);
                expect(outcome.error.message).toBe('Cannot read properties of undefined');
            }
        });

        it('should record a location with no passes as a success without rows', async () => {
            predict.mockResolvedValueOnce([]);

            const run = await service.fetchAll(locations.slice(0, 1));

            expect(run.rows).toEqual([]);
            expect(run.failed).toEqual([]);
            expect(run.outcomes.get('CA')).toEqual({ ok: true, passes: [] });
        });

        it('should handle an empty location list', async () => {
            const run = await service.fetchAll([]);

            expect(predict).not.toHaveBeenCalled();
            expect(run.rows).toEqual([]);
            expect(run.outcomes.size).toBe(0);
        });
    });
});
