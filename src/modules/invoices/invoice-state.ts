import type { InvoiceStage, InvoiceStatus } from './interfaces';

/**
 * Every legal (stage, status) pair. The status alone is stored; the stage is
 * always derived from it, so the two can never disagree.
 */
export type InvoiceState =
  | { stage: 'captured'; status: 'captured' }
  | { stage: 'coding'; status: 'coding' }
  | { stage: 'dept_review'; status: 'dept_review' }
  | { stage: 'dept_review'; status: 'approved' }
  | { stage: 'price_review'; status: 'price_review' }
  | { stage: 'price_review'; status: 'complete' };

const STAGE_OF = {
  captured: 'captured',
  coding: 'coding',
  dept_review: 'dept_review',
  approved: 'dept_review',
  price_review: 'price_review',
  complete: 'price_review',
} as const satisfies Record<InvoiceStatus, InvoiceStage>;

const STAGE_ORDER: Record<InvoiceStage, number> = {
  captured: 1,
  coding: 2,
  dept_review: 3,
  price_review: 4,
};

export const INVOICE_STATUSES = [
  'captured',
  'coding',
  'dept_review',
  'approved',
  'price_review',
  'complete',
] as const satisfies readonly InvoiceStatus[];

/** Statuses whose line items are already in the price ledger. */
export const COMPARABLE_STATUSES: readonly InvoiceStatus[] = ['approved', 'price_review', 'complete'];

export const PENDING_CODING_STATUSES: readonly InvoiceStatus[] = ['captured', 'coding'];

export function stateOf(status: InvoiceStatus): InvoiceState {
  switch (status) {
    case 'captured':
      return { stage: 'captured', status };
    case 'coding':
      return { stage: 'coding', status };
    case 'dept_review':
      return { stage: 'dept_review', status };
    case 'approved':
      return { stage: 'dept_review', status };
    case 'price_review':
      return { stage: 'price_review', status };
    case 'complete':
      return { stage: 'price_review', status };
  }
}

export type Transition = 'completeCoding' | 'approve' | 'reject' | 'resolvePriceReview';

const ALLOWED: Record<Transition, { from: readonly InvoiceStatus[]; to: readonly InvoiceStatus[] }> = {
  completeCoding: { from: ['captured', 'coding'], to: ['dept_review'] },
  approve: { from: ['dept_review'], to: ['approved', 'price_review'] },
  reject: { from: ['dept_review'], to: ['coding'] },
  resolvePriceReview: { from: ['price_review', 'complete'], to: ['complete'] },
};

export function canTransition(transition: Transition, from: InvoiceStatus): boolean {
  return ALLOWED[transition].from.includes(from);
}

/**
 * Checks a transition's target, including the rule that the stage only ever
 * moves backwards through a rejection.
 */
export function isLegalMove(transition: Transition, from: InvoiceStatus, to: InvoiceStatus): boolean {
  if (!canTransition(transition, from) || !ALLOWED[transition].to.includes(to)) {
    return false;
  }
  const delta = STAGE_ORDER[STAGE_OF[to]] - STAGE_ORDER[STAGE_OF[from]];
  return transition === 'reject' ? delta < 0 : delta >= 0;
}
