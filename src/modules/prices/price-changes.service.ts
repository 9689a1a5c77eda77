import { Injectable, Logger } from '@nestjs/common';
import { and, asc, desc, eq, inArray, ne, or } from 'drizzle-orm';

import { DatabaseService, type Executor } from '../../database/database.service';
import { priceChanges, type PriceChangeRow } from '../../database/schema';
import { nowIso, roundMoney } from '../../common/utils';
import { toRpcException } from '../../common/errors';
import type { ReviewDecision } from '../invoices/interfaces';
import type { PriceChangeView, VendorPriceChanges, VendorPriceImpact } from './interfaces';

@Injectable()
export class PriceChangesService {
  private readonly logger = new Logger(PriceChangesService.name);

  constructor(private readonly database: DatabaseService) {}

  async listPending(): Promise<VendorPriceChanges[]> {
    try {
      const pending = this.database.db
        .select()
        .from(priceChanges)
        .where(eq(priceChanges.reviewStatus, 'pending'))
        .orderBy(asc(priceChanges.vendorName), asc(priceChanges.id))
        .all();

      const groups = new Map<string, PriceChangeRow[]>();
      for (const change of pending) {
        const group = groups.get(change.vendorName) ?? [];
        group.push(change);
        groups.set(change.vendorName, group);
      }

      return [...groups.entries()].map(([vendorName, changes]) => ({
        vendorName,
        impact: summarizeImpact(changes),
        changes,
      }));
    } catch (error) {
      throw toRpcException(error, this.logger);
    }
  }

  async history(vendorName?: string, limit = 200): Promise<PriceChangeView[]> {
    try {
      return this.database.db
        .select()
        .from(priceChanges)
        .where(vendorName ? eq(priceChanges.vendorName, vendorName) : undefined)
        .orderBy(desc(priceChanges.createdAt), desc(priceChanges.id))
        .limit(limit)
        .all();
    } catch (error) {
      throw toRpcException(error, this.logger);
    }
  }

  find(tx: Executor, id: number): PriceChangeRow | undefined {
    return tx.select().from(priceChanges).where(eq(priceChanges.id, id)).get();
  }

  pendingForInvoice(tx: Executor, invoiceId: number): PriceChangeRow[] {
    return tx
      .select()
      .from(priceChanges)
      .where(and(eq(priceChanges.invoiceId, invoiceId), eq(priceChanges.reviewStatus, 'pending')))
      .orderBy(asc(priceChanges.id))
      .all();
  }

  forInvoice(tx: Executor, invoiceId: number): PriceChangeRow[] {
    return tx
      .select()
      .from(priceChanges)
      .where(eq(priceChanges.invoiceId, invoiceId))
      .orderBy(asc(priceChanges.id))
      .all();
  }

  markReviewed(
    tx: Executor,
    ids: number[],
    review: { decision: ReviewDecision; reviewer: string; notes?: string },
  ): PriceChangeRow[] {
    if (ids.length === 0) {
      return [];
    }

    return tx
      .update(priceChanges)
      .set({
        reviewStatus: review.decision,
        reviewedBy: review.reviewer,
        reviewedAt: nowIso(),
        reviewNotes: review.notes ?? null,
      })
      .where(and(inArray(priceChanges.id, ids), eq(priceChanges.reviewStatus, 'pending')))
      .returning()
      .all();
  }

  /** Other invoices holding changes that compared against `invoiceId`. */
  dependentInvoiceIds(tx: Executor, invoiceId: number): number[] {
    const rows = tx
      .selectDistinct({ invoiceId: priceChanges.invoiceId })
      .from(priceChanges)
      .where(and(eq(priceChanges.previousInvoiceId, invoiceId), ne(priceChanges.invoiceId, invoiceId)))
      .orderBy(asc(priceChanges.invoiceId))
      .all();
    return rows.map((row) => row.invoiceId);
  }

  /** Removes every change that was triggered by, or compared against, the invoice. */
  removeForInvoice(tx: Executor, invoiceId: number): number {
    return tx
      .delete(priceChanges)
      .where(or(eq(priceChanges.invoiceId, invoiceId), eq(priceChanges.previousInvoiceId, invoiceId)))
      .run().changes;
  }
}

export function summarizeImpact(changes: PriceChangeRow[]): VendorPriceImpact {
  const totalDifference = changes.reduce((sum, change) => sum + change.priceDifference, 0);
  const totalPercent = changes.reduce((sum, change) => sum + change.percentChange, 0);

  return {
    changeCount: changes.length,
    increases: changes.filter((change) => change.priceDifference > 0).length,
    decreases: changes.filter((change) => change.priceDifference < 0).length,
    totalDifference: roundMoney(totalDifference),
    averagePercentChange: changes.length > 0 ? roundMoney(totalPercent / changes.length) : 0,
    invoiceCount: new Set(changes.map((change) => change.invoiceId)).size,
  };
}
