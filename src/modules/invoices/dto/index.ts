export * from './create-invoice.dto';
export * from './get-invoice.dto';
export * from './import-invoices.dto';
export * from './line-item.dto';
export * from './list-invoices.dto';
