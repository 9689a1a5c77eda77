import { Inject, Injectable, Logger } from '@nestjs/common';
import { ClientProxy, RpcException } from '@nestjs/microservices';
import { and, asc, count, eq, inArray } from 'drizzle-orm';

import { InvoiceEvents, NATS_SERVICE } from '../../config';
import { toRpcException } from '../../common/errors';
import { nowIso } from '../../common/utils';
import { DatabaseService } from '../../database/database.service';
import { invoices, priceChanges, type InvoiceRow } from '../../database/schema';
import { DepartmentsService, type DepartmentAssignment } from '../departments/departments.service';
import { toLineItem } from '../invoices/dto';
import type { InvoiceStatus, InvoiceView } from '../invoices/interfaces';
import { PENDING_CODING_STATUSES } from '../invoices/invoice-state';
import { toInvoiceView } from '../invoices/invoice.mapper';
import {
  assertTransition,
  assertVersion,
  InvoicesRepository,
  type InvoiceChanges,
} from '../invoices/invoices.repository';
import { PriceChangeDetectorService } from '../prices/price-change-detector.service';
import { PriceLedgerService } from '../prices/price-ledger.service';
import { ApproveInvoiceDto, CompleteCodingDto, RejectInvoiceDto, TaxFieldsDto } from './dto';

export interface WorkflowHealth {
  status: 'ok';
  invoices: Partial<Record<InvoiceStatus, number>>;
  pendingPriceChanges: number;
}

@Injectable()
export class WorkflowService {
  private readonly logger = new Logger(WorkflowService.name);

  constructor(
    @Inject(NATS_SERVICE) private readonly client: ClientProxy,
    private readonly database: DatabaseService,
    private readonly repository: InvoicesRepository,
    private readonly departments: DepartmentsService,
    private readonly ledger: PriceLedgerService,
    private readonly detector: PriceChangeDetectorService,
  ) {}

  async pendingCoding(): Promise<InvoiceView[]> {
    try {
      return this.database.db
        .select()
        .from(invoices)
        .where(inArray(invoices.status, [...PENDING_CODING_STATUSES]))
        .orderBy(asc(invoices.createdAt), asc(invoices.id))
        .all()
        .map(toInvoiceView);
    } catch (error) {
      throw toRpcException(error, this.logger);
    }
  }

  /**
   * Stores the coder's GL coding and tax breakdown and hands the invoice to
   * the reviewer of its department.
   */
  async completeCoding(payload: CompleteCodingDto): Promise<InvoiceView> {
    try {
      const row = this.database.transaction((tx) => {
        const invoice = this.repository.findOrThrow(tx, payload.invoiceId);
        assertVersion(invoice, payload.expectedVersion);
        assertTransition(invoice, 'completeCoding');
        if (payload.lineItems) {
          assertLineItemsEditable(invoice);
        }

        const { department, reviewer } = this.departments.resolve(payload.department);
        const now = nowIso();

        const changes: InvoiceChanges = {
          glAccount: payload.glAccount,
          costCenter: payload.costCenter ?? null,
          department,
          poNumber: payload.poNumber ?? null,
          receiptNumber: payload.receiptNumber ?? null,
          coder: payload.coder,
          codedAt: now,
          codingNotes: payload.notes ?? null,
          ...(payload.tax ? taxChanges(payload.tax) : {}),
          ...(payload.lineItems ? { lineItems: payload.lineItems.map(toLineItem) } : {}),
          deptReviewer: reviewer,
          deptAssignedAt: now,
          deptReviewedAt: null,
          deptReviewNotes: null,
          deptDecision: 'pending',
        };

        return this.repository.transition(tx, invoice, 'completeCoding', 'dept_review', changes, payload.coder);
      });

      this.logger.log(
        `🧾 Invoice ${row.id} coded by ${payload.coder}, assigned to ${row.deptReviewer} (${row.department})`,
      );

      return toInvoiceView(row);
    } catch (error) {
      throw toRpcException(error, this.logger);
    }
  }

  async deptQueue(reviewer: string): Promise<InvoiceView[]> {
    try {
      return this.database.db
        .select()
        .from(invoices)
        .where(
          and(
            eq(invoices.status, 'dept_review'),
            eq(invoices.deptReviewer, reviewer.trim()),
            eq(invoices.deptDecision, 'pending'),
          ),
        )
        .orderBy(asc(invoices.deptAssignedAt), asc(invoices.id))
        .all()
        .map(toInvoiceView);
    } catch (error) {
      throw toRpcException(error, this.logger);
    }
  }

  /**
   * Approves on behalf of the assigned reviewer. The line items go into the
   * price ledger and are compared with the vendor's previous invoice in the
   * same transaction; any change sends the invoice to price review.
   */
  async approve(payload: ApproveInvoiceDto): Promise<InvoiceView> {
    try {
      const { row, changeCount } = this.database.transaction((tx) => {
        const invoice = this.repository.findOrThrow(tx, payload.invoiceId);
        this.assertAssignedReviewer(invoice, payload.reviewer);
        assertVersion(invoice, payload.expectedVersion);
        assertTransition(invoice, 'approve');
        this.assertPendingDecision(invoice);

        this.ledger.record(tx, invoice);
        const changes = this.detector.detect(tx, invoice);
        const detected = changes.length > 0;

        const updated = this.repository.transition(
          tx,
          invoice,
          'approve',
          detected ? 'price_review' : 'approved',
          {
            deptDecision: 'approved',
            deptReviewedAt: nowIso(),
            deptReviewNotes: payload.notes ?? null,
            priceChangesDetected: detected,
            priceChangeCount: changes.length,
          },
          payload.reviewer,
        );

        return { row: updated, changeCount: changes.length };
      });

      this.logger.log(
        `✅ Invoice ${row.id} approved by ${payload.reviewer}` +
          (changeCount > 0 ? `, ${changeCount} price change(s) to review` : ''),
      );
      this.client.emit(InvoiceEvents.approved, {
        invoiceId: row.id,
        vendorName: row.vendorName,
        status: row.status,
        priceChangeCount: changeCount,
      });

      return toInvoiceView(row);
    } catch (error) {
      throw toRpcException(error, this.logger);
    }
  }

  /** Sends the invoice back to coding. Coding fields stay until re-coded. */
  async reject(payload: RejectInvoiceDto): Promise<InvoiceView> {
    try {
      const row = this.database.transaction((tx) => {
        const invoice = this.repository.findOrThrow(tx, payload.invoiceId);
        this.assertAssignedReviewer(invoice, payload.reviewer);
        assertVersion(invoice, payload.expectedVersion);
        assertTransition(invoice, 'reject');
        this.assertPendingDecision(invoice);

        return this.repository.transition(
          tx,
          invoice,
          'reject',
          'coding',
          {
            deptDecision: 'rejected',
            deptReviewedAt: nowIso(),
            deptReviewNotes: payload.notes,
          },
          payload.reviewer,
        );
      });

      this.logger.log(`↩️ Invoice ${row.id} rejected by ${payload.reviewer}`);
      this.client.emit(InvoiceEvents.rejected, {
        invoiceId: row.id,
        reviewer: payload.reviewer,
        notes: payload.notes,
      });

      return toInvoiceView(row);
    } catch (error) {
      throw toRpcException(error, this.logger);
    }
  }

  listDepartments(): DepartmentAssignment[] {
    return this.departments.list();
  }

  async health(): Promise<WorkflowHealth> {
    try {
      const byStatus = this.database.db
        .select({ status: invoices.status, total: count() })
        .from(invoices)
        .groupBy(invoices.status)
        .all();

      const [pending] = this.database.db
        .select({ total: count() })
        .from(priceChanges)
        .where(eq(priceChanges.reviewStatus, 'pending'))
        .all();

      const counts: Partial<Record<InvoiceStatus, number>> = {};
      for (const { status, total } of byStatus) {
        counts[status] = total;
      }

      return { status: 'ok', invoices: counts, pendingPriceChanges: pending?.total ?? 0 };
    } catch (error) {
      throw toRpcException(error, this.logger);
    }
  }

  private assertAssignedReviewer(invoice: InvoiceRow, reviewer: string): void {
    if (invoice.deptReviewer !== reviewer.trim()) {
      this.logger.warn(`Reviewer ${reviewer} acted on invoice ${invoice.id} assigned to ${invoice.deptReviewer}`);
      throw new RpcException({
        status: 403,
        message: `Invoice ${invoice.id} is not assigned to ${reviewer}`,
      });
    }
  }

  private assertPendingDecision(invoice: InvoiceRow): void {
    if (invoice.deptDecision !== 'pending') {
      throw new RpcException({
        status: 409,
        message: `Invoice ${invoice.id} was already ${invoice.deptDecision}`,
      });
    }
  }
}

// Line items are frozen once a reviewer has seen them, rejection included.
function assertLineItemsEditable(invoice: InvoiceRow): void {
  if (invoice.deptReviewer !== null) {
    throw new RpcException({
      status: 400,
      message: `Invoice ${invoice.id} line items are locked after department review`,
    });
  }
}

function taxChanges(tax: TaxFieldsDto): InvoiceChanges {
  return {
    gst: tax.gst ?? null,
    pst: tax.pst ?? null,
    hst: tax.hst ?? null,
    qst: tax.qst ?? null,
    usTax: tax.usTax ?? null,
    ...(tax.taxTotal !== undefined ? { taxTotal: tax.taxTotal } : {}),
    taxNotes: tax.taxNotes ?? null,
  };
}
