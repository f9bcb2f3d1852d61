import { Module } from '@nestjs/common';
import { SharedHttpModule } from '../shared/http';
import { PassTimeClient } from './pass-time.client';
import { PredictionsController } from './predictions.controller';

@Module({
    imports: [SharedHttpModule],
    controllers: [PredictionsController],
    providers: [PassTimeClient],
    exports: [PassTimeClient],
})
export class PredictionsModule { }
