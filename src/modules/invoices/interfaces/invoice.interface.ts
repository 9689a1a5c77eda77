export type InvoiceSource = 'ocr' | 'manual' | 'import';

export type InvoiceStage = 'captured' | 'coding' | 'dept_review' | 'price_review';

export type InvoiceStatus =
  | 'captured'
  | 'coding'
  | 'dept_review'
  | 'approved'
  | 'price_review'
  | 'complete';

export type DeptDecision = 'pending' | 'approved' | 'rejected';

export type ReviewStatus = 'pending' | 'acknowledged' | 'escalated';

export type ReviewDecision = Exclude<ReviewStatus, 'pending'>;

export interface LineItem {
  description: string | null;
  sku: string | null;
  quantity: number | null;
  unit: string | null;
  unitPrice: number | null;
  lineTotal: number | null;
  taxAmount: number | null;
}

export interface TaxBreakdown {
  gst: number | null;
  pst: number | null;
  hst: number | null;
  qst: number | null;
  usTax: number | null;
  taxNotes: string | null;
}

export interface InvoiceView {
  id: number;
  createdAt: string;
  version: number;
  source: InvoiceSource;
  filename: string | null;

  vendorName: string | null;
  invoiceNumber: string | null;
  invoiceDate: string | null;
  dueDate: string | null;
  currency: string | null;
  subtotal: number | null;
  totalAmount: number | null;
  taxTotal: number | null;
  tax: TaxBreakdown;
  lineItems: LineItem[];

  stage: InvoiceStage;
  status: InvoiceStatus;

  coding: {
    glAccount: string | null;
    costCenter: string | null;
    department: string | null;
    poNumber: string | null;
    receiptNumber: string | null;
    coder: string | null;
    codedAt: string | null;
    notes: string | null;
  };

  deptReview: {
    reviewer: string | null;
    assignedAt: string | null;
    reviewedAt: string | null;
    notes: string | null;
    decision: DeptDecision;
  };

  priceReview: {
    changesDetected: boolean;
    changeCount: number;
  };

  updatedAt: string;
  updatedBy: string | null;
}
