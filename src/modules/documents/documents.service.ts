import { Inject, Injectable, Logger } from '@nestjs/common';
import { ClientProxy, RpcException } from '@nestjs/microservices';

import { InvoiceEvents, NATS_SERVICE } from '../../config';
import { toRpcException } from '../../common/errors';
import { DatabaseService } from '../../database/database.service';
import type { InvoiceView, LineItem } from '../invoices/interfaces';
import { toInvoiceView } from '../invoices/invoice.mapper';
import { InvoicesRepository } from '../invoices/invoices.repository';
import { TaxClassifierService } from '../tax/tax-classifier.service';
import { DocumentAnalysisError, DocumentIntelligenceService } from './document-intelligence.service';
import { SubmitDocumentDto } from './dto';
import type { AnalyzedLineItem, InvoiceAnalysis } from './interfaces';

@Injectable()
export class DocumentsService {
  private readonly logger = new Logger(DocumentsService.name);

  constructor(
    @Inject(NATS_SERVICE) private readonly client: ClientProxy,
    private readonly database: DatabaseService,
    private readonly repository: InvoicesRepository,
    private readonly documentIntelligence: DocumentIntelligenceService,
    private readonly taxClassifier: TaxClassifierService,
  ) {}

  /**
   * Analyses an uploaded invoice and stores it as a captured invoice with its
   * taxes pre-classified. Nothing is stored when the analysis fails.
   */
  async submit(payload: SubmitDocumentDto): Promise<InvoiceView> {
    try {
      const buffer = Buffer.from(payload.buffer, 'base64');
      if (buffer.byteLength === 0) {
        throw new RpcException({ status: 400, message: 'Uploaded file is empty' });
      }

      this.logger.log(`📄 Analysing ${payload.filename} (${buffer.byteLength} bytes) from ${payload.uploadedBy}`);
      const analysis = await this.analyze(buffer, payload.filename);

      const tax = this.taxClassifier.classify({
        taxTotal: analysis.taxTotal,
        subtotal: analysis.subtotal,
        text: analysis.content,
      });

      const row = this.repository.insert(this.database.db, {
        source: 'ocr',
        filename: payload.filename,
        vendorName: analysis.vendorName,
        invoiceNumber: analysis.invoiceNumber,
        invoiceDate: analysis.invoiceDate,
        dueDate: analysis.dueDate,
        currency: analysis.currency,
        subtotal: analysis.subtotal,
        totalAmount: analysis.total,
        taxTotal: analysis.taxTotal,
        ...tax,
        lineItems: analysis.items.map(toStoredLineItem),
        rawAnalysis: analysis,
        status: 'captured',
        updatedBy: payload.uploadedBy,
      });

      this.logger.log(
        `✅ Invoice ${row.id} captured from ${payload.filename}: ${row.vendorName ?? 'unknown vendor'}, ` +
          `${row.lineItems.length} line item(s)`,
      );
      this.client.emit(InvoiceEvents.captured, { invoiceId: row.id, source: row.source });

      return toInvoiceView(row);
    } catch (error) {
      throw toRpcException(error, this.logger);
    }
  }

  private async analyze(buffer: Buffer, filename: string): Promise<InvoiceAnalysis> {
    try {
      return await this.documentIntelligence.analyzeInvoice(buffer);
    } catch (error) {
      if (error instanceof DocumentAnalysisError) {
        throw new RpcException({
          status: 502,
          message: `Document analysis failed for ${filename}: ${error.message}`,
        });
      }
      throw error;
    }
  }
}

const toStoredLineItem = (item: AnalyzedLineItem): LineItem => ({
  description: item.description,
  sku: item.sku,
  quantity: item.quantity,
  unit: item.unit,
  unitPrice: item.unitPrice,
  lineTotal: item.lineTotal,
  taxAmount: item.taxAmount,
});
