import { Inject, Injectable, Logger } from '@nestjs/common';
import { ClientProxy, RpcException } from '@nestjs/microservices';

import { InvoiceEvents, NATS_SERVICE } from '../../config';
import { toRpcException } from '../../common/errors';
import { DatabaseService, type Executor } from '../../database/database.service';
import type { InvoiceRow, PriceChangeRow } from '../../database/schema';
import type { InvoiceView } from '../invoices/interfaces';
import { toInvoiceView } from '../invoices/invoice.mapper';
import { InvoicesRepository } from '../invoices/invoices.repository';
import type { PriceChangeView } from '../prices/interfaces';
import { PriceChangesService } from '../prices/price-changes.service';
import { ResolvePriceChangeDto, ResolvePriceChangesBulkDto } from './dto';

export interface PriceReviewResult {
  invoice: InvoiceView;
  resolved: PriceChangeView[];
  remainingPending: number;
}

/** Closes out price review: each flagged change is acknowledged or escalated. */
@Injectable()
export class PriceReviewService {
  private readonly logger = new Logger(PriceReviewService.name);

  constructor(
    @Inject(NATS_SERVICE) private readonly client: ClientProxy,
    private readonly database: DatabaseService,
    private readonly repository: InvoicesRepository,
    private readonly priceChanges: PriceChangesService,
  ) {}

  async resolve(payload: ResolvePriceChangeDto): Promise<PriceReviewResult> {
    try {
      const result = this.database.transaction((tx) => {
        const change = this.priceChanges.find(tx, payload.changeId);
        if (!change) {
          throw new RpcException({ status: 404, message: `Price change ${payload.changeId} not found` });
        }
        if (change.reviewStatus !== 'pending') {
          throw new RpcException({
            status: 400,
            message: `Price change ${change.id} was already ${change.reviewStatus}`,
          });
        }

        const resolved = this.priceChanges.markReviewed(tx, [change.id], payload);
        const remaining = this.priceChanges.pendingForInvoice(tx, change.invoiceId).length;
        const invoice = this.repository.findOrThrow(tx, change.invoiceId);

        return {
          invoice: remaining === 0 ? this.complete(tx, invoice, payload.reviewer) : invoice,
          resolved,
          remaining,
        };
      });

      this.logger.log(
        `🔎 Price change ${payload.changeId} ${payload.decision} by ${payload.reviewer}, ` +
          `${result.remaining} pending on invoice ${result.invoice.id}`,
      );
      this.emitCompletion(result.invoice, result.remaining);

      return this.toResult(result.invoice, result.resolved, result.remaining);
    } catch (error) {
      throw toRpcException(error, this.logger);
    }
  }

  /** Applies one decision to every pending change of the invoice, then completes it. */
  async resolveBulk(payload: ResolvePriceChangesBulkDto): Promise<PriceReviewResult> {
    try {
      const result = this.database.transaction((tx) => {
        const invoice = this.repository.findOrThrow(tx, payload.invoiceId);
        const pending = this.priceChanges.pendingForInvoice(tx, invoice.id);

        if (pending.length === 0) {
          throw new RpcException({
            status: 404,
            message: `No pending price changes for invoice ${invoice.id}`,
          });
        }

        const resolved = this.priceChanges.markReviewed(
          tx,
          pending.map((change) => change.id),
          payload,
        );

        return { invoice: this.complete(tx, invoice, payload.reviewer), resolved };
      });

      this.logger.log(
        `🔎 ${result.resolved.length} price change(s) on invoice ${result.invoice.id} ${payload.decision} by ${payload.reviewer}`,
      );
      this.emitCompletion(result.invoice, 0);

      return this.toResult(result.invoice, result.resolved, 0);
    } catch (error) {
      throw toRpcException(error, this.logger);
    }
  }

  private complete(tx: Executor, invoice: InvoiceRow, reviewer: string): InvoiceRow {
    return this.repository.transition(tx, invoice, 'resolvePriceReview', 'complete', {}, reviewer);
  }

  private emitCompletion(invoice: InvoiceRow, remaining: number): void {
    if (remaining === 0) {
      this.client.emit(InvoiceEvents.completed, { invoiceId: invoice.id, vendorName: invoice.vendorName });
    }
  }

  private toResult(invoice: InvoiceRow, resolved: PriceChangeRow[], remaining: number): PriceReviewResult {
    return {
      invoice: toInvoiceView(invoice),
      resolved: [...resolved].sort((a, b) => a.id - b.id),
      remainingPending: remaining,
    };
  }
}
