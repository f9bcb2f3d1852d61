/**
 * @fileoverview Passes Barrel Export
 */

export * from './passes.module';
export * from './passes.service';
export * from './fetch-orchestrator.service';
export * from './map-presenter.service';
export * from './reshaper';
export * from './interfaces';
