/**
 * @fileoverview Reference Barrel Export
 */

export * from './reference.module';
export * from './reference-loader.service';
export * from './delimited-text';
export * from './interfaces';
