import { Injectable, Logger } from '@nestjs/common';
import { and, desc, eq, inArray, ne } from 'drizzle-orm';

import type { Executor } from '../../database/database.service';
import {
  invoices,
  priceChanges,
  type InvoiceRow,
  type NewPriceChangeRow,
  type PriceChangeRow,
  type PriceHistoryRow,
} from '../../database/schema';
import { normalizeItemKey, nowIso, roundMoney } from '../../common/utils';
import { COMPARABLE_STATUSES } from '../invoices/invoice-state';
import { PriceLedgerService } from './price-ledger.service';

/** Unit price differences below this are treated as unchanged. */
export const PRICE_TOLERANCE = 0.001;

@Injectable()
export class PriceChangeDetectorService {
  private readonly logger = new Logger(PriceChangeDetectorService.name);

  constructor(private readonly ledger: PriceLedgerService) {}

  /**
   * Compares `invoice` against the vendor's most recent comparable invoice and
   * stores one change record per item whose unit price moved. A vendor's first
   * invoice has nothing to compare against and yields no changes.
   */
  detect(tx: Executor, invoice: InvoiceRow): PriceChangeRow[] {
    const previous = this.findPreviousInvoice(tx, invoice);
    if (!previous) {
      return [];
    }

    const previousPrices = new Map<string, PriceHistoryRow>();
    for (const entry of this.ledger.forInvoice(tx, previous.id)) {
      previousPrices.set(normalizeItemKey(entry.itemDescription), entry);
    }

    const createdAt = nowIso();
    const changes: NewPriceChangeRow[] = [];

    for (const item of invoice.lineItems) {
      if (item.unitPrice === null) {
        continue;
      }

      const prior = previousPrices.get(normalizeItemKey(item.description));
      if (!prior || prior.unitPrice === null) {
        continue;
      }

      const difference = item.unitPrice - prior.unitPrice;
      if (Math.abs(difference) < PRICE_TOLERANCE) {
        continue;
      }

      const percent = prior.unitPrice === 0 ? 0 : (difference / prior.unitPrice) * 100;

      changes.push({
        createdAt,
        invoiceId: invoice.id,
        previousInvoiceId: previous.id,
        vendorName: previous.vendorName ?? '',
        itemDescription: item.description ?? '',
        itemSku: item.sku,
        department: invoice.department,
        previousPrice: prior.unitPrice,
        newPrice: item.unitPrice,
        priceDifference: roundMoney(difference),
        percentChange: roundMoney(percent),
        previousInvoiceDate: previous.invoiceDate,
        newInvoiceDate: invoice.invoiceDate,
      });
    }

    if (changes.length === 0) {
      return [];
    }

    this.logger.log(
      `Invoice ${invoice.id}: ${changes.length} price change(s) against invoice ${previous.id}`,
    );

    return tx.insert(priceChanges).values(changes).returning().all();
  }

  findPreviousInvoice(tx: Executor, invoice: InvoiceRow): InvoiceRow | undefined {
    if (!invoice.vendorName) {
      return undefined;
    }

    return tx
      .select()
      .from(invoices)
      .where(
        and(
          eq(invoices.vendorName, invoice.vendorName),
          ne(invoices.id, invoice.id),
          inArray(invoices.status, [...COMPARABLE_STATUSES]),
        ),
      )
      .orderBy(desc(invoices.createdAt), desc(invoices.id))
      .limit(1)
      .get();
  }
}
