import type { PriceChangeRow } from '../../../database/schema';

export type PriceChangeView = PriceChangeRow;

export interface VendorPriceImpact {
  changeCount: number;
  increases: number;
  decreases: number;
  totalDifference: number;
  averagePercentChange: number;
  invoiceCount: number;
}

export interface VendorPriceChanges {
  vendorName: string;
  impact: VendorPriceImpact;
  changes: PriceChangeView[];
}
