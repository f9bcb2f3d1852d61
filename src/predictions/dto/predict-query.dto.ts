/**
 * @fileoverview Predict Query DTO
 */

import { Type } from 'class-transformer';
import { IsNumber, Min, Max } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class PredictQueryDto {
    @ApiProperty({ example: 38.58, description: 'Latitude in signed decimal degrees' })
    @Type(() => Number)
    @IsNumber()
    @Min(-90)
    @Max(90)
    lat!: number;

    @ApiProperty({ example: -121.49, description: 'Longitude in signed decimal degrees' })
    @Type(() => Number)
    @IsNumber()
    @Min(-180)
    @Max(180)
    lon!: number;
}
