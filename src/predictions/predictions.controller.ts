/**
 * @fileoverview Predictions Controller
 *
 * Exposes a single pass prediction for an arbitrary point.
 */

import { BadGatewayException, Controller, Get, Query } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { PredictionUnavailableError } from '../shared/errors';
import { PredictQueryDto } from './dto/predict-query.dto';
import { RankedPass } from './interfaces';
import { PassTimeClient } from './pass-time.client';

@ApiTags('predictions')
@Controller('predictions')
export class PredictionsController {
    constructor(private passTimeClient: PassTimeClient) { }

    @Get()
    @ApiOperation({ summary: 'Upcoming ISS passes over a point', description: 'One call to the prediction service, no caching' })
    async predict(@Query() query: PredictQueryDto): Promise<RankedPass[]> {
        try {
            return await this.passTimeClient.predict(query.lat, query.lon);
        } catch (error) {
            if (error instanceof PredictionUnavailableError) {
                throw new BadGatewayException(error.message);
            }
            throw error;
        }
    }
}
