import { Inject, Injectable, Logger } from '@nestjs/common';
import { ClientProxy } from '@nestjs/microservices';
import { and, desc, eq, type SQL } from 'drizzle-orm';

import { InvoiceEvents, NATS_SERVICE } from '../../config';
import { toRpcException } from '../../common/errors';
import { DatabaseService } from '../../database/database.service';
import { invoices, type InvoiceRow } from '../../database/schema';
import { PriceChangesService } from '../prices/price-changes.service';
import { PriceLedgerService } from '../prices/price-ledger.service';
import {
  CreateInvoiceDto,
  ImportedInvoiceDto,
  ImportInvoicesDto,
  ListInvoicesDto,
  toLineItem,
} from './dto';
import type { InvoiceView } from './interfaces';
import { toInvoiceView } from './invoice.mapper';
import { InvoicesRepository } from './invoices.repository';

export interface ImportSummary {
  imported: number;
  invoiceIds: number[];
  ledgerRows: number;
}

export interface DeleteSummary {
  id: number;
  ledgerRows: number;
  priceChanges: number;
  /** Later invoices whose price review emptied out and were closed. */
  completedInvoiceIds: number[];
}

@Injectable()
export class InvoicesService {
  private readonly logger = new Logger(InvoicesService.name);

  constructor(
    @Inject(NATS_SERVICE) private readonly client: ClientProxy,
    private readonly database: DatabaseService,
    private readonly repository: InvoicesRepository,
    private readonly ledger: PriceLedgerService,
    private readonly priceChanges: PriceChangesService,
  ) {}

  async create(payload: CreateInvoiceDto): Promise<InvoiceView> {
    try {
      const row = this.repository.insert(this.database.db, {
        source: 'manual',
        vendorName: payload.vendorName?.trim() || null,
        invoiceNumber: payload.invoiceNumber?.trim() || null,
        invoiceDate: payload.invoiceDate?.trim() || null,
        dueDate: payload.dueDate?.trim() || null,
        currency: payload.currency?.trim().toUpperCase() || null,
        subtotal: payload.subtotal ?? null,
        totalAmount: payload.totalAmount ?? null,
        taxTotal: payload.taxTotal ?? null,
        lineItems: payload.lineItems.map(toLineItem),
        status: 'captured',
        updatedBy: payload.createdBy,
      });

      this.logger.log(`📝 Invoice ${row.id} entered manually by ${payload.createdBy}`);
      this.client.emit(InvoiceEvents.captured, { invoiceId: row.id, source: row.source });

      return toInvoiceView(row);
    } catch (error) {
      throw toRpcException(error, this.logger);
    }
  }

  async getById(id: number): Promise<InvoiceView> {
    try {
      return toInvoiceView(this.repository.findOrThrow(this.database.db, id));
    } catch (error) {
      throw toRpcException(error, this.logger);
    }
  }

  async list(filter: ListInvoicesDto): Promise<InvoiceView[]> {
    try {
      const conditions: SQL[] = [];
      if (filter.status) {
        conditions.push(eq(invoices.status, filter.status));
      }
      if (filter.vendorName) {
        conditions.push(eq(invoices.vendorName, filter.vendorName));
      }

      const rows = this.database.db
        .select()
        .from(invoices)
        .where(conditions.length > 0 ? and(...conditions) : undefined)
        .orderBy(desc(invoices.createdAt), desc(invoices.id))
        .all();

      return rows.map(toInvoiceView);
    } catch (error) {
      throw toRpcException(error, this.logger);
    }
  }

  /**
   * Deletes the invoice with its ledger rows and every price change that
   * points at it from either side. Later invoices that compared against it
   * get their change counts recomputed, and leave price review when nothing
   * is left pending.
   */
  async remove(id: number, deletedBy?: string): Promise<DeleteSummary> {
    const actor = deletedBy ?? 'system';

    try {
      const summary = this.database.transaction((tx) => {
        this.repository.findOrThrow(tx, id);

        const dependents = this.priceChanges.dependentInvoiceIds(tx, id);
        const priceChanges = this.priceChanges.removeForInvoice(tx, id);
        const ledgerRows = this.ledger.removeForInvoice(tx, id);
        tx.delete(invoices).where(eq(invoices.id, id)).run();

        const completed: InvoiceRow[] = [];
        for (const dependentId of dependents) {
          const dependent = this.repository.findOrThrow(tx, dependentId);
          const remaining = this.priceChanges.forInvoice(tx, dependentId);
          const counts = { priceChangesDetected: remaining.length > 0, priceChangeCount: remaining.length };
          const stillPending = remaining.some((change) => change.reviewStatus === 'pending');

          if (dependent.status === 'price_review' && !stillPending) {
            completed.push(
              this.repository.transition(tx, dependent, 'resolvePriceReview', 'complete', counts, actor),
            );
          } else {
            this.repository.update(tx, dependent, counts, actor);
          }
        }

        return { id, ledgerRows, priceChanges, completed };
      });

      this.logger.log(
        `🗑️ Invoice ${id} deleted${deletedBy ? ` by ${deletedBy}` : ''} ` +
          `(${summary.ledgerRows} ledger rows, ${summary.priceChanges} price changes)`,
      );
      for (const invoice of summary.completed) {
        this.logger.log(`✅ Invoice ${invoice.id} left price review after its predecessor was deleted`);
        this.client.emit(InvoiceEvents.completed, { invoiceId: invoice.id, vendorName: invoice.vendorName });
      }

      return {
        id,
        ledgerRows: summary.ledgerRows,
        priceChanges: summary.priceChanges,
        completedInvoiceIds: summary.completed.map((invoice) => invoice.id),
      };
    } catch (error) {
      throw toRpcException(error, this.logger);
    }
  }

  /**
   * Seeds historical invoices as already approved. They are written oldest
   * first so that later live approvals compare against the right predecessor.
   */
  async import(payload: ImportInvoicesDto): Promise<ImportSummary> {
    try {
      const ordered = sortByInvoiceDate(payload.invoices);

      const summary = this.database.transaction((tx) => {
        const invoiceIds: number[] = [];
        let ledgerRows = 0;

        for (const imported of ordered) {
          const row = this.repository.insert(tx, {
            source: 'import',
            vendorName: imported.vendorName.trim(),
            invoiceNumber: imported.invoiceNumber?.trim() || null,
            invoiceDate: imported.invoiceDate?.trim() || null,
            currency: imported.currency?.trim().toUpperCase() || null,
            subtotal: imported.subtotal ?? null,
            totalAmount: imported.totalAmount ?? null,
            taxTotal: imported.taxTotal ?? null,
            department: imported.department?.trim().toLowerCase() || null,
            lineItems: imported.lineItems.map(toLineItem),
            status: 'approved',
            deptDecision: 'approved',
            updatedBy: payload.importedBy,
          });

          ledgerRows += this.ledger.record(tx, row).length;
          invoiceIds.push(row.id);
        }

        return { imported: invoiceIds.length, invoiceIds, ledgerRows };
      });

      this.logger.log(
        `📦 Imported ${summary.imported} invoices (${summary.ledgerRows} ledger rows) for ${payload.importedBy}`,
      );

      return summary;
    } catch (error) {
      throw toRpcException(error, this.logger);
    }
  }
}

/** Stable sort by parsed invoice date; invoices without a readable date go last. */
export function sortByInvoiceDate(batch: ImportedInvoiceDto[]): ImportedInvoiceDto[] {
  const timeOf = (invoice: ImportedInvoiceDto) => {
    const parsed = invoice.invoiceDate ? Date.parse(invoice.invoiceDate) : Number.NaN;
    return Number.isNaN(parsed) ? Number.POSITIVE_INFINITY : parsed;
  };

  return batch
    .map((invoice, index) => ({ invoice, index, time: timeOf(invoice) }))
    .sort((a, b) => (a.time === b.time ? a.index - b.index : a.time - b.time))
    .map(({ invoice }) => invoice);
}

