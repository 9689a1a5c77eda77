import { integer, real, sqliteTable, text } from 'drizzle-orm/sqlite-core';

import type {
  DeptDecision,
  InvoiceSource,
  InvoiceStatus,
  LineItem,
  ReviewStatus,
} from '../modules/invoices/interfaces';
import type { InvoiceAnalysis } from '../modules/documents/interfaces';

// DDL lives in db/schema.sql, applied by DatabaseService on startup.

export const invoices = sqliteTable('invoices', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  createdAt: text('created_at').notNull(),
  version: integer('version').notNull().default(1),

  source: text('source').$type<InvoiceSource>().notNull(),
  filename: text('filename'),

  vendorName: text('vendor_name'),
  invoiceNumber: text('invoice_number'),
  invoiceDate: text('invoice_date'),
  dueDate: text('due_date'),
  currency: text('currency'),
  subtotal: real('subtotal'),
  totalAmount: real('total_amount'),
  taxTotal: real('tax_total'),

  // tax buckets, filled by the classifier or by the coder
  gst: real('gst'),
  pst: real('pst'),
  hst: real('hst'),
  qst: real('qst'),
  usTax: real('us_tax'),
  taxNotes: text('tax_notes'),

  lineItems: text('line_items', { mode: 'json' }).$type<LineItem[]>().notNull(),
  rawAnalysis: text('raw_analysis', { mode: 'json' }).$type<InvoiceAnalysis>(),

  status: text('status').$type<InvoiceStatus>().notNull(),

  glAccount: text('gl_account'),
  costCenter: text('cost_center'),
  department: text('department'),
  poNumber: text('po_number'),
  receiptNumber: text('receipt_number'),
  coder: text('coder'),
  codedAt: text('coded_at'),
  codingNotes: text('coding_notes'),

  deptReviewer: text('dept_reviewer'),
  deptAssignedAt: text('dept_assigned_at'),
  deptReviewedAt: text('dept_reviewed_at'),
  deptReviewNotes: text('dept_review_notes'),
  deptDecision: text('dept_decision').$type<DeptDecision>().notNull().default('pending'),

  priceChangesDetected: integer('price_changes_detected', { mode: 'boolean' })
    .notNull()
    .default(false),
  priceChangeCount: integer('price_change_count').notNull().default(0),

  updatedAt: text('updated_at').notNull(),
  updatedBy: text('updated_by'),
});

export const priceHistory = sqliteTable('price_history', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  createdAt: text('created_at').notNull(),
  invoiceId: integer('invoice_id')
    .notNull()
    .references(() => invoices.id),
  vendorName: text('vendor_name').notNull(),
  itemDescription: text('item_description').notNull(),
  itemSku: text('item_sku'),
  unitPrice: real('unit_price'),
  quantity: real('quantity'),
  unit: text('unit'),
  lineTotal: real('line_total'),
  invoiceDate: text('invoice_date'),
  department: text('department'),
});

export const priceChanges = sqliteTable('price_changes', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  createdAt: text('created_at').notNull(),
  invoiceId: integer('invoice_id')
    .notNull()
    .references(() => invoices.id),
  previousInvoiceId: integer('previous_invoice_id')
    .notNull()
    .references(() => invoices.id),
  vendorName: text('vendor_name').notNull(),
  itemDescription: text('item_description').notNull(),
  itemSku: text('item_sku'),
  department: text('department'),
  previousPrice: real('previous_price').notNull(),
  newPrice: real('new_price').notNull(),
  priceDifference: real('price_difference').notNull(),
  percentChange: real('percent_change').notNull(),
  previousInvoiceDate: text('previous_invoice_date'),
  newInvoiceDate: text('new_invoice_date'),
  reviewStatus: text('review_status').$type<ReviewStatus>().notNull().default('pending'),
  reviewedBy: text('reviewed_by'),
  reviewedAt: text('reviewed_at'),
  reviewNotes: text('review_notes'),
});

export type InvoiceRow = typeof invoices.$inferSelect;
export type NewInvoiceRow = typeof invoices.$inferInsert;
export type PriceHistoryRow = typeof priceHistory.$inferSelect;
export type NewPriceHistoryRow = typeof priceHistory.$inferInsert;
export type PriceChangeRow = typeof priceChanges.$inferSelect;
export type NewPriceChangeRow = typeof priceChanges.$inferInsert;
