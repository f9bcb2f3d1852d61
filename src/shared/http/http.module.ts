/**
 * @fileoverview Shared HTTP Module
 *
 * Provides the outbound HTTP client to the reference and prediction verticals.
 */

import { Module } from '@nestjs/common';
import { HttpClientProvider } from './http-client.provider';

@Module({
    providers: [HttpClientProvider],
    exports: [HttpClientProvider],
})
export class SharedHttpModule { }
