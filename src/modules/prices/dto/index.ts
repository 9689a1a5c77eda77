export * from './price-change-history.dto';
export * from './price-ledger.dto';
