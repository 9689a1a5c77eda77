import { Injectable } from '@nestjs/common';

import { roundMoney } from '../../common/utils';
import type { TaxBreakdown } from '../invoices/interfaces';

export const GOODS_TAX_RATE = 0.05;

export const TaxNotes = {
  detected: 'auto-detected',
  estimatedSplit: 'auto-detected, estimated split',
  unknown: 'tax type unknown, needs manual review',
} as const;

const HARMONIZED = /\bHST\b/i;
const GOODS = /\bGST\b/i;
const PROVINCIAL = /\bPST\b/i;
const QUEBEC = /\b(?:QST|TVQ)\b/i;

export interface TaxClassificationInput {
  taxTotal: number | null;
  subtotal: number | null;
  text: string | null;
}

export type TaxClassification = Omit<TaxBreakdown, 'usTax'>;

const empty = (taxNotes: string | null): TaxClassification => ({
  gst: null,
  pst: null,
  hst: null,
  qst: null,
  taxNotes,
});

/**
 * Best-effort split of a known tax total into Canadian tax buckets, driven by
 * the tax labels printed on the document. Coders can overwrite every bucket.
 */
@Injectable()
export class TaxClassifierService {
  classify({ taxTotal, subtotal, text }: TaxClassificationInput): TaxClassification {
    if (taxTotal === null || taxTotal === 0) {
      return empty(null);
    }

    const content = text ?? '';

    if (HARMONIZED.test(content)) {
      return { ...empty(TaxNotes.detected), hst: taxTotal };
    }

    const hasGoods = GOODS.test(content);
    const quebec = QUEBEC.test(content);

    if (hasGoods && (quebec || PROVINCIAL.test(content))) {
      const split = this.splitGoodsAndProvincial(taxTotal, subtotal);
      return quebec
        ? { ...empty(TaxNotes.estimatedSplit), gst: split.goods, qst: split.provincial }
        : { ...empty(TaxNotes.estimatedSplit), gst: split.goods, pst: split.provincial };
    }

    if (hasGoods) {
      return { ...empty(TaxNotes.detected), gst: taxTotal };
    }

    return empty(TaxNotes.unknown);
  }

  // Without a usable subtotal, or when 5% of it exceeds the total, the whole
  // amount is booked as GST.
  private splitGoodsAndProvincial(
    taxTotal: number,
    subtotal: number | null,
  ): { goods: number; provincial: number | null } {
    if (subtotal === null || subtotal <= 0) {
      return { goods: taxTotal, provincial: null };
    }

    const goods = roundMoney(subtotal * GOODS_TAX_RATE);
    const provincial = roundMoney(taxTotal - goods);

    if (provincial < 0) {
      return { goods: taxTotal, provincial: null };
    }

    return { goods, provincial };
  }
}
