export const NATS_SERVICE = 'NATS_SERVICE';

export const InvoicesSubjects = {
  submitDocument: 'invoices.documents.submit',
  create: 'invoices.create',
  getById: 'invoices.getById',
  list: 'invoices.list',
  delete: 'invoices.delete',
  import: 'invoices.import',
} as const;

export const WorkflowSubjects = {
  pendingCoding: 'workflow.coding.pending',
  completeCoding: 'workflow.coding.complete',
  departments: 'workflow.departments.list',
  deptQueue: 'workflow.dept.queue',
  approve: 'workflow.dept.approve',
  reject: 'workflow.dept.reject',
  health: 'workflow.health.check',
} as const;

export const PricesSubjects = {
  pendingChanges: 'prices.changes.pending',
  resolveChange: 'prices.changes.resolve',
  resolveBulk: 'prices.changes.resolveBulk',
  history: 'prices.changes.history',
  ledger: 'prices.ledger.byVendor',
} as const;

export const InvoiceEvents = {
  captured: 'invoices.captured',
  approved: 'invoices.approved',
  rejected: 'invoices.rejected',
  completed: 'invoices.completed',
} as const;
