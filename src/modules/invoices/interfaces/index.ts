export * from './invoice.interface';
