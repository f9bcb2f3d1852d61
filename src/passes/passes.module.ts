/**
 * @fileoverview Passes Module
 *
 * Fetch loop, reshaping and map presentation over the reference locations.
 */

import { Module } from '@nestjs/common';
import { ReferenceModule } from '../reference';
import { PredictionsModule } from '../predictions';
import { FetchOrchestratorService } from './fetch-orchestrator.service';
import { MapPresenterService } from './map-presenter.service';
import { PassesService } from './passes.service';
import { PassesController } from './passes.controller';

@Module({
    imports: [ReferenceModule, PredictionsModule],
    controllers: [PassesController],
    providers: [FetchOrchestratorService, MapPresenterService, PassesService],
    exports: [PassesService, MapPresenterService],
})
export class PassesModule { }
