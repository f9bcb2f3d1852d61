/**
 * @fileoverview Application Root Module
 *
 * Configures the NestJS application with logging, metrics, and feature modules.
 */

import { Module } from '@nestjs/common';
import { LoggerModule } from 'nestjs-pino';
import { PrometheusModule } from '@willsoto/nestjs-prometheus';
import { ConfigModule } from './config/config.module';
import { PredictionsModule } from './predictions';
import { PassesModule } from './passes';

const isProduction = process.env.NODE_ENV === 'production';

@Module({
    imports: [
        // Logging
        LoggerModule.forRoot({
            pinoHttp: {
                level: process.env.LOG_LEVEL ?? (isProduction ? 'info' : 'debug'),
                transport: isProduction || process.env.NODE_ENV === 'test'
                    ? undefined // JSON output
                    : {
                        targets: [
                            {
                                target: 'pino-pretty',
                                level: 'debug',
                                options: { colorize: true },
                            },
                            // Ship to Loki only when one is configured
                            ...(process.env.LOKI_HOST
                                ? [{
                                    target: 'pino-loki',
                                    level: 'info',
                                    options: {
                                        host: process.env.LOKI_HOST,
                                        labels: { app: 'iss-capital-passes' },
                                        batching: true,
                                        interval: 5,
                                    },
                                }]
                                : []),
                        ],
                    },
                redact: ['req.headers.authorization', 'res.headers["set-cookie"]'],
            },
        }),

        // Metrics
        PrometheusModule.register({
            path: '/metrics',
            defaultMetrics: { enabled: true },
        }),

        // Shared modules
        ConfigModule,

        // Feature modules
        PredictionsModule,
        PassesModule,
    ],
})
export class AppModule { }
