export * from './prediction-row.interface';
export * from './location-passes.interface';
