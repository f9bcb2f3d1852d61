/**
 * @fileoverview Passes Controller
 *
 * HTTP endpoints for the pass table and its map markers. Every request runs
 * the pipeline afresh; nothing is cached.
 */

import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { PassesReport } from './interfaces';
import { MapPresenterService, PassesFeatureCollection } from './map-presenter.service';
import { PassesService } from './passes.service';

@ApiTags('passes')
@Controller('passes')
export class PassesController {
    constructor(
        private passesService: PassesService,
        private mapPresenter: MapPresenterService,
    ) { }

    @Get()
    @ApiOperation({ summary: 'Next ISS passes per capital', description: 'One row per capital, soonest pass first' })
    async passes(): Promise<PassesReport> {
        return this.passesService.run();
    }

    @Get('map')
    @ApiOperation({ summary: 'Map markers', description: 'GeoJSON points with hover and popup labels' })
    async map(): Promise<PassesFeatureCollection> {
        const report = await this.passesService.run();
        return this.mapPresenter.toFeatureCollection(report.passes);
    }

    @Get('health')
    @ApiOperation({ summary: 'Health check' })
    health(): { status: string } {
        return { status: 'ok' };
    }
}
