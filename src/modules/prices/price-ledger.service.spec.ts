import { rpcError } from '../../../test/rpc-error';
import { createTestContext, line, type TestContext } from '../../../test/testing-module';
import { toLineItem } from '../invoices/dto';
import { InvoicesRepository } from '../invoices/invoices.repository';
import { PriceLedgerService } from './price-ledger.service';

describe('PriceLedgerService', () => {
  let ctx: TestContext;
  let repository: InvoicesRepository;
  let ledger: PriceLedgerService;

  beforeEach(async () => {
    ctx = await createTestContext();
    repository = ctx.moduleRef.get(InvoicesRepository);
    ledger = ctx.moduleRef.get(PriceLedgerService);
  });

  afterEach(async () => {
    await ctx.moduleRef.close();
  });

  it('writes one row per line item', () => {
    const invoice = repository.insert(ctx.database.db, {
      source: 'manual',
      vendorName: 'Acme Foods',
      invoiceDate: '2024-05-01',
      department: 'kitchen',
      lineItems: [line('Flour', 10, 2), line('Sugar', 5)].map(toLineItem),
      status: 'approved',
    });

    const rows = ledger.record(ctx.database.db, invoice);

    expect(rows.map((row) => [row.itemDescription, row.unitPrice, row.quantity, row.lineTotal])).toEqual([
      ['Flour', 10, 2, null],
      ['Sugar', 5, 1, null],
    ]);
    expect(rows[0]).toMatchObject({
      invoiceId: invoice.id,
      vendorName: 'Acme Foods',
      invoiceDate: '2024-05-01',
      department: 'kitchen',
    });
    expect(ledger.forInvoice(ctx.database.db, invoice.id)).toEqual(rows);
  });

  it('stores blanks for a missing vendor or description', () => {
    const invoice = repository.insert(ctx.database.db, {
      source: 'manual',
      lineItems: [toLineItem({ unitPrice: 4 })],
      status: 'approved',
    });

    const [row] = ledger.record(ctx.database.db, invoice);

    expect(row.vendorName).toBe('');
    expect(row.itemDescription).toBe('');
  });

  it('writes nothing for an invoice without line items', () => {
    const invoice = repository.insert(ctx.database.db, {
      source: 'manual',
      vendorName: 'Acme Foods',
      lineItems: [],
      status: 'approved',
    });

    expect(ledger.record(ctx.database.db, invoice)).toEqual([]);
  });

  it('removes the rows of one invoice only', () => {
    const insert = () =>
      repository.insert(ctx.database.db, {
        source: 'manual',
        vendorName: 'Acme Foods',
        lineItems: [line('Flour', 10)].map(toLineItem),
        status: 'approved',
      });
    const first = insert();
    const second = insert();
    ledger.record(ctx.database.db, first);
    ledger.record(ctx.database.db, second);

    expect(ledger.removeForInvoice(ctx.database.db, first.id)).toBe(1);
    expect(ledger.forVendor(ctx.database.db, 'Acme Foods').map((row) => row.invoiceId)).toEqual([second.id]);
  });

  describe('vendorHistory', () => {
    it('lists the recorded prices of one vendor oldest first', async () => {
      const insert = (vendorName: string, unitPrice: number) =>
        repository.insert(ctx.database.db, {
          source: 'manual',
          vendorName,
          lineItems: [line('Flour', unitPrice)].map(toLineItem),
          status: 'approved',
        });
      const first = insert('Acme Foods', 10);
      const other = insert('Dairy Co', 3);
      const second = insert('Acme Foods', 11);
      ledger.record(ctx.database.db, first);
      ledger.record(ctx.database.db, other);
      ledger.record(ctx.database.db, second);

      const history = await ledger.vendorHistory(' Acme Foods ');

      expect(history.map((row) => [row.invoiceId, row.unitPrice])).toEqual([
        [first.id, 10],
        [second.id, 11],
      ]);
    });

    it('returns an empty list for an unknown vendor', async () => {
      expect(await ledger.vendorHistory('Nobody Ltd')).toEqual([]);
    });

    it('maps a storage failure to an internal error', async () => {
      jest.spyOn(ledger, 'forVendor').mockImplementation(() => {
        throw new Error('disk I/O error');
      });

      expect(await rpcError(ledger.vendorHistory('Acme Foods'))).toEqual({
        status: 500,
        message: 'Internal server error',
      });
    });
  });
});
