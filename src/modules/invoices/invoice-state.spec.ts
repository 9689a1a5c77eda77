import { canTransition, INVOICE_STATUSES, isLegalMove, stateOf } from './invoice-state';

describe('invoice state', () => {
  it('derives the stage from the status', () => {
    expect(stateOf('captured')).toEqual({ stage: 'captured', status: 'captured' });
    expect(stateOf('coding')).toEqual({ stage: 'coding', status: 'coding' });
    expect(stateOf('dept_review')).toEqual({ stage: 'dept_review', status: 'dept_review' });
    expect(stateOf('approved')).toEqual({ stage: 'dept_review', status: 'approved' });
    expect(stateOf('price_review')).toEqual({ stage: 'price_review', status: 'price_review' });
    expect(stateOf('complete')).toEqual({ stage: 'price_review', status: 'complete' });
  });

  it('lists every status once', () => {
    expect(new Set(INVOICE_STATUSES).size).toBe(6);
  });

  it('only codes captured or rejected invoices', () => {
    expect(canTransition('completeCoding', 'captured')).toBe(true);
    expect(canTransition('completeCoding', 'coding')).toBe(true);
    expect(canTransition('completeCoding', 'dept_review')).toBe(false);
    expect(canTransition('completeCoding', 'approved')).toBe(false);
  });

  it('reviews only invoices waiting on a department', () => {
    for (const status of INVOICE_STATUSES) {
      expect(canTransition('approve', status)).toBe(status === 'dept_review');
      expect(canTransition('reject', status)).toBe(status === 'dept_review');
    }
  });

  it('never moves the stage backwards except on rejection', () => {
    expect(isLegalMove('completeCoding', 'captured', 'dept_review')).toBe(true);
    expect(isLegalMove('completeCoding', 'coding', 'dept_review')).toBe(true);
    expect(isLegalMove('approve', 'dept_review', 'approved')).toBe(true);
    expect(isLegalMove('approve', 'dept_review', 'price_review')).toBe(true);
    expect(isLegalMove('approve', 'dept_review', 'coding')).toBe(false);
    expect(isLegalMove('reject', 'dept_review', 'coding')).toBe(true);
    expect(isLegalMove('reject', 'dept_review', 'approved')).toBe(false);
    expect(isLegalMove('resolvePriceReview', 'price_review', 'complete')).toBe(true);
    expect(isLegalMove('resolvePriceReview', 'approved', 'complete')).toBe(false);
  });
});
