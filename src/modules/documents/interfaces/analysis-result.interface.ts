import type { LineItem } from '../../invoices/interfaces';

export interface AnalyzedLineItem extends LineItem {
  date: string | null;
}

/** Flat invoice record produced by the document-analysis collaborator. */
export interface InvoiceAnalysis {
  vendorName: string | null;
  vendorAddress: string | null;
  invoiceNumber: string | null;
  invoiceDate: string | null;
  dueDate: string | null;
  currency: string | null;
  subtotal: number | null;
  taxTotal: number | null;
  total: number | null;
  customerName: string | null;
  customerAddress: string | null;
  items: AnalyzedLineItem[];
  /** Full extracted text, used to classify taxes. */
  content: string | null;
}
