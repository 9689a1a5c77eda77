import { Injectable } from '@nestjs/common';
import { RpcException } from '@nestjs/microservices';
import { and, eq } from 'drizzle-orm';

import type { Executor } from '../../database/database.service';
import { invoices, type InvoiceRow, type NewInvoiceRow } from '../../database/schema';
import { nowIso } from '../../common/utils';
import type { InvoiceStatus } from './interfaces';
import { canTransition, isLegalMove, type Transition } from './invoice-state';

export type InvoiceChanges = Omit<
  Partial<NewInvoiceRow>,
  'id' | 'createdAt' | 'version' | 'updatedAt' | 'updatedBy'
>;

@Injectable()
export class InvoicesRepository {
  find(tx: Executor, id: number): InvoiceRow | undefined {
    return tx.select().from(invoices).where(eq(invoices.id, id)).get();
  }

  findOrThrow(tx: Executor, id: number): InvoiceRow {
    const invoice = this.find(tx, id);
    if (!invoice) {
      throw new RpcException({ status: 404, message: `Invoice ${id} not found` });
    }
    return invoice;
  }

  insert(tx: Executor, data: Omit<NewInvoiceRow, 'id' | 'createdAt' | 'updatedAt'>): InvoiceRow {
    const now = nowIso();
    const [row] = tx
      .insert(invoices)
      .values({ ...data, createdAt: now, updatedAt: now })
      .returning()
      .all();
    return row;
  }

  /**
   * Writes `changes` only if nobody else bumped the version since `current`
   * was read; otherwise fails with a conflict.
   */
  update(tx: Executor, current: InvoiceRow, changes: InvoiceChanges, actor: string): InvoiceRow {
    const [row] = tx
      .update(invoices)
      .set({
        ...changes,
        version: current.version + 1,
        updatedAt: nowIso(),
        updatedBy: actor,
      })
      .where(and(eq(invoices.id, current.id), eq(invoices.version, current.version)))
      .returning()
      .all();

    if (!row) {
      throw new RpcException({
        status: 409,
        message: `Invoice ${current.id} was modified concurrently, reload and retry`,
      });
    }

    return row;
  }

  /** Moves the invoice to `to`, writing `changes` alongside the new status. */
  transition(
    tx: Executor,
    current: InvoiceRow,
    transition: Transition,
    to: InvoiceStatus,
    changes: InvoiceChanges,
    actor: string,
  ): InvoiceRow {
    if (!isLegalMove(transition, current.status, to)) {
      throw new Error(`Illegal ${transition} transition from ${current.status} to ${to}`);
    }
    return this.update(tx, current, { ...changes, status: to }, actor);
  }
}

const ACTION_LABELS: Record<Transition, string> = {
  completeCoding: 'coded',
  approve: 'approved',
  reject: 'rejected',
  resolvePriceReview: 'closed',
};

export function assertTransition(invoice: InvoiceRow, transition: Transition): void {
  if (!canTransition(transition, invoice.status)) {
    throw new RpcException({
      status: 409,
      message: `Invoice ${invoice.id} cannot be ${ACTION_LABELS[transition]} while ${invoice.status}`,
    });
  }
}

export function assertVersion(invoice: InvoiceRow, expectedVersion: number | undefined): void {
  if (expectedVersion !== undefined && invoice.version !== expectedVersion) {
    throw new RpcException({
      status: 409,
      message: `Invoice ${invoice.id} is at version ${invoice.version}, expected ${expectedVersion}`,
    });
  }
}
