import { TaxClassifierService, TaxNotes } from './tax-classifier.service';

describe('TaxClassifierService', () => {
  const classifier = new TaxClassifierService();

  it('books the whole total as HST when HST is printed', () => {
    expect(
      classifier.classify({ taxTotal: 26, subtotal: 200, text: 'Subtotal 200.00\nHST #123 26.00' }),
    ).toEqual({ gst: null, pst: null, hst: 26, qst: null, taxNotes: 'auto-detected' });
  });

  it('prefers HST even when GST is printed as well', () => {
    expect(classifier.classify({ taxTotal: 13, subtotal: 100, text: 'GST/HST registration' }).hst).toBe(13);
  });

  it('estimates the GST share and books the rest as PST', () => {
    expect(
      classifier.classify({ taxTotal: 13, subtotal: 100, text: 'GST 5%  PST 8%' }),
    ).toEqual({ gst: 5, pst: 8, hst: null, qst: null, taxNotes: 'auto-detected, estimated split' });
  });

  it('books the provincial remainder as QST for Quebec invoices', () => {
    expect(
      classifier.classify({ taxTotal: 14.98, subtotal: 100, text: 'TPS/GST 5.00 TVQ/QST 9.98' }),
    ).toEqual({ gst: 5, pst: null, hst: null, qst: 9.98, taxNotes: TaxNotes.estimatedSplit });
  });

  it('books everything as GST when the subtotal is unknown', () => {
    expect(classifier.classify({ taxTotal: 12, subtotal: null, text: 'gst pst' })).toEqual({
      gst: 12,
      pst: null,
      hst: null,
      qst: null,
      taxNotes: TaxNotes.estimatedSplit,
    });
  });

  it('collapses into GST when the estimate exceeds the total', () => {
    expect(classifier.classify({ taxTotal: 3, subtotal: 100, text: 'GST PST' })).toMatchObject({
      gst: 3,
      pst: null,
    });
  });

  it('books the whole total as GST when only GST is printed', () => {
    expect(classifier.classify({ taxTotal: 4.5, subtotal: 90, text: 'GST 4.50' })).toEqual({
      gst: 4.5,
      pst: null,
      hst: null,
      qst: null,
      taxNotes: 'auto-detected',
    });
  });

  it('does not match labels inside other words', () => {
    expect(classifier.classify({ taxTotal: 7, subtotal: 70, text: 'Augst delivery, Hamster feed' })).toEqual({
      gst: null,
      pst: null,
      hst: null,
      qst: null,
      taxNotes: 'tax type unknown, needs manual review',
    });
  });

  it('skips classification without a tax total', () => {
    expect(classifier.classify({ taxTotal: 0, subtotal: 100, text: 'GST' }).taxNotes).toBeNull();
    expect(classifier.classify({ taxTotal: null, subtotal: 100, text: 'GST' }).gst).toBeNull();
  });
});
