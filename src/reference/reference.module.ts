/**
 * @fileoverview Reference Module
 *
 * Loads the state capital reference tables.
 */

import { Module } from '@nestjs/common';
import { SharedHttpModule } from '../shared/http';
import { ReferenceLoaderService } from './reference-loader.service';

@Module({
    imports: [SharedHttpModule],
    providers: [ReferenceLoaderService],
    exports: [ReferenceLoaderService],
})
export class ReferenceModule { }
