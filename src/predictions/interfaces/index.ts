export * from './ranked-pass.interface';
