export * from './numbers';
export * from './text';
