export * from './analysis-result.interface';
