import type { InvoiceRow } from '../../database/schema';
import type { InvoiceView } from './interfaces';
import { stateOf } from './invoice-state';

export function toInvoiceView(row: InvoiceRow): InvoiceView {
  const { stage, status } = stateOf(row.status);

  return {
    id: row.id,
    createdAt: row.createdAt,
    version: row.version,
    source: row.source,
    filename: row.filename,
    vendorName: row.vendorName,
    invoiceNumber: row.invoiceNumber,
    invoiceDate: row.invoiceDate,
    dueDate: row.dueDate,
    currency: row.currency,
    subtotal: row.subtotal,
    totalAmount: row.totalAmount,
    taxTotal: row.taxTotal,
    tax: {
      gst: row.gst,
      pst: row.pst,
      hst: row.hst,
      qst: row.qst,
      usTax: row.usTax,
      taxNotes: row.taxNotes,
    },
    lineItems: row.lineItems,
    stage,
    status,
    coding: {
      glAccount: row.glAccount,
      costCenter: row.costCenter,
      department: row.department,
      poNumber: row.poNumber,
      receiptNumber: row.receiptNumber,
      coder: row.coder,
      codedAt: row.codedAt,
      notes: row.codingNotes,
    },
    deptReview: {
      reviewer: row.deptReviewer,
      assignedAt: row.deptAssignedAt,
      reviewedAt: row.deptReviewedAt,
      notes: row.deptReviewNotes,
      decision: row.deptDecision,
    },
    priceReview: {
      changesDetected: row.priceChangesDetected,
      changeCount: row.priceChangeCount,
    },
    updatedAt: row.updatedAt,
    updatedBy: row.updatedBy,
  };
}
