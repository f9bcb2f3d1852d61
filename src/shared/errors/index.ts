export * from './pipeline.errors';
