import { Injectable, Logger } from '@nestjs/common';
import { asc, eq } from 'drizzle-orm';

import { DatabaseService, type Executor } from '../../database/database.service';
import { priceHistory, type InvoiceRow, type PriceHistoryRow } from '../../database/schema';
import { nowIso } from '../../common/utils';
import { toRpcException } from '../../common/errors';

/**
 * Append-only record of every approved line item price. Rows are only ever
 * removed together with the invoice that wrote them.
 */
@Injectable()
export class PriceLedgerService {
  private readonly logger = new Logger(PriceLedgerService.name);

  constructor(private readonly database: DatabaseService) {}

  /** Every recorded price of the vendor, oldest first. */
  async vendorHistory(vendorName: string): Promise<PriceHistoryRow[]> {
    try {
      return this.forVendor(this.database.db, vendorName.trim());
    } catch (error) {
      throw toRpcException(error, this.logger);
    }
  }

  record(tx: Executor, invoice: InvoiceRow): PriceHistoryRow[] {
    if (invoice.lineItems.length === 0) {
      return [];
    }

    const createdAt = nowIso();

    return tx
      .insert(priceHistory)
      .values(
        invoice.lineItems.map((item) => ({
          createdAt,
          invoiceId: invoice.id,
          vendorName: invoice.vendorName ?? '',
          itemDescription: item.description ?? '',
          itemSku: item.sku,
          unitPrice: item.unitPrice,
          quantity: item.quantity,
          unit: item.unit,
          lineTotal: item.lineTotal,
          invoiceDate: invoice.invoiceDate,
          department: invoice.department,
        })),
      )
      .returning()
      .all();
  }

  forInvoice(tx: Executor, invoiceId: number): PriceHistoryRow[] {
    return tx
      .select()
      .from(priceHistory)
      .where(eq(priceHistory.invoiceId, invoiceId))
      .orderBy(asc(priceHistory.id))
      .all();
  }

  forVendor(tx: Executor, vendorName: string): PriceHistoryRow[] {
    return tx
      .select()
      .from(priceHistory)
      .where(eq(priceHistory.vendorName, vendorName))
      .orderBy(asc(priceHistory.id))
      .all();
  }

  /** Cascade for invoice deletion; there is no other delete path. */
  removeForInvoice(tx: Executor, invoiceId: number): number {
    return tx.delete(priceHistory).where(eq(priceHistory.invoiceId, invoiceId)).run().changes;
  }
}
