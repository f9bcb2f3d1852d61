/**
 * @fileoverview Predictions Barrel Export
 */

export * from './predictions.module';
export * from './pass-time.client';
export * from './interfaces';
