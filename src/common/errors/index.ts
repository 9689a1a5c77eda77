export * from './rpc-errors';
