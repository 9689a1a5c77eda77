export * from './price-change.interface';
