import { DocumentAnalysisError, DocumentIntelligenceService } from './document-intelligence.service';

const OPERATION_URL = 'https://docintel.test.local/documentintelligence/documentModels/prebuilt-invoice/analyzeResults/op-1';

const accepted = () =>
  new Response(null, { status: 202, headers: { 'Operation-Location': OPERATION_URL } });

const operation = (body: unknown) => new Response(JSON.stringify(body), { status: 200 });

const succeeded = {
  status: 'succeeded',
  analyzeResult: {
    content: '  ACME FOODS\nInvoice INV-1001\nGST 5.00\nPST 7.00\n',
    documents: [
      {
        docType: 'invoice',
        fields: {
          VendorName: { type: 'string', valueString: 'Acme Foods', content: 'ACME FOODS' },
          InvoiceId: { type: 'string', valueString: 'INV-1001', content: 'INV-1001' },
          InvoiceDate: { type: 'date', valueDate: '2024-05-01', content: 'May 1, 2024' },
          SubTotal: { type: 'currency', valueCurrency: { amount: 100, currencyCode: 'CAD' } },
          TotalTax: { type: 'currency', valueCurrency: { amount: 12, currencyCode: 'CAD' } },
          InvoiceTotal: { type: 'currency', valueCurrency: { amount: 112, currencyCode: 'CAD' } },
          VendorAddress: { type: 'address', content: '1 Mill Road' },
          Items: {
            type: 'array',
            valueArray: [
              {
                type: 'object',
                valueObject: {
                  Description: { type: 'string', valueString: 'Flour 20kg' },
                  Quantity: { type: 'number', valueNumber: 2 },
                  UnitPrice: { type: 'currency', valueCurrency: { amount: 25 } },
                  Amount: { type: 'currency', content: '$50.00' },
                },
              },
              {
                type: 'object',
                valueObject: {
                  Description: { type: 'string', content: 'Sugar' },
                  Quantity: { type: 'number', content: '1' },
                  UnitPrice: { type: 'currency', content: '50,00' },
                  Date: { type: 'date', valueDate: '2024-04-30' },
                },
              },
            ],
          },
        },
      },
    ],
  },
};

describe('DocumentIntelligenceService', () => {
  const service = new DocumentIntelligenceService();
  let fetchMock: jest.SpiedFunction<typeof fetch>;

  beforeEach(() => {
    fetchMock = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('submits the document and polls until the analysis succeeds', async () => {
    fetchMock
      .mockResolvedValueOnce(accepted())
      .mockResolvedValueOnce(operation({ status: 'running' }))
      .mockResolvedValueOnce(operation(succeeded));

    const analysis = await service.analyzeInvoice(Buffer.from('%PDF-test'));

    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(fetchMock).toHaveBeenNthCalledWith(
      1,
      'https://docintel.test.local/documentintelligence/documentModels/prebuilt-invoice:analyze?api-version=2024-11-30',
      {
        method: 'POST',
        headers: { 'Ocp-Apim-Subscription-Key': 'test-key', 'Content-Type': 'application/json' },
        body: JSON.stringify({ base64Source: Buffer.from('%PDF-test').toString('base64') }),
      },
    );
    expect(fetchMock).toHaveBeenNthCalledWith(2, OPERATION_URL, {
      method: 'GET',
      headers: { 'Ocp-Apim-Subscription-Key': 'test-key' },
    });

    expect(analysis).toEqual({
      vendorName: 'Acme Foods',
      vendorAddress: '1 Mill Road',
      invoiceNumber: 'INV-1001',
      invoiceDate: '2024-05-01',
      dueDate: null,
      currency: 'CAD',
      subtotal: 100,
      taxTotal: 12,
      total: 112,
      customerName: null,
      customerAddress: null,
      items: [
        {
          description: 'Flour 20kg',
          sku: null,
          quantity: 2,
          unit: null,
          unitPrice: 25,
          lineTotal: 50,
          taxAmount: null,
          date: null,
        },
        {
          description: 'Sugar',
          sku: null,
          quantity: 1,
          unit: null,
          unitPrice: 50,
          lineTotal: null,
          taxAmount: null,
          date: '2024-04-30',
        },
      ],
      content: 'ACME FOODS\nInvoice INV-1001\nGST 5.00\nPST 7.00',
    });
  });

  it('fails when the service rejects the request', async () => {
    fetchMock.mockResolvedValueOnce(new Response('invalid subscription key', { status: 401 }));

    await expect(service.analyzeInvoice(Buffer.from('%PDF-test'))).rejects.toThrow(
      new DocumentAnalysisError('Analyze request rejected (401): invalid subscription key'),
    );
  });

  it('fails when the analysis fails', async () => {
    fetchMock
      .mockResolvedValueOnce(accepted())
      .mockResolvedValueOnce(operation({ status: 'failed', error: { code: 'InvalidContent', message: 'Corrupt file' } }));

    await expect(service.analyzeInvoice(Buffer.from('%PDF-test'))).rejects.toThrow('Corrupt file');
  });

  it('fails when no invoice was found in the document', async () => {
    fetchMock
      .mockResolvedValueOnce(accepted())
      .mockResolvedValueOnce(operation({ status: 'succeeded', analyzeResult: { content: '', documents: [] } }));

    await expect(service.analyzeInvoice(Buffer.from('%PDF-test'))).rejects.toThrow('No invoice document detected');
  });

  it('gives up after the configured number of polls', async () => {
    fetchMock
      .mockResolvedValueOnce(accepted())
      .mockImplementation(async () => operation({ status: 'running' }));

    await expect(service.analyzeInvoice(Buffer.from('%PDF-test'))).rejects.toThrow(
      'Analysis still running after 60 polls',
    );
    expect(fetchMock).toHaveBeenCalledTimes(61);
  });

  it('wraps network errors', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

    await expect(service.analyzeInvoice(Buffer.from('%PDF-test'))).rejects.toBeInstanceOf(DocumentAnalysisError);
  });
});
