import { Injectable, Logger } from '@nestjs/common';
import * as joi from 'joi';

import { envs } from '../../config';
import { normalizeNumber, normalizeText } from '../../common/utils';
import type { AnalyzedLineItem, InvoiceAnalysis } from './interfaces';

export type DocumentField = {
  type?: string;
  content?: string;
  valueString?: string;
  valueNumber?: number;
  valueInteger?: number;
  valueDate?: string;
  valueCurrency?: { amount?: number; currencyCode?: string };
  valueArray?: DocumentField[];
  valueObject?: Record<string, DocumentField>;
};

type OperationStatus = 'notStarted' | 'running' | 'succeeded' | 'failed' | 'canceled';

interface AnalyzeOperation {
  status: OperationStatus;
  analyzeResult?: {
    content?: string;
    documents?: Array<{ fields?: Record<string, DocumentField> }>;
  };
  error?: { code?: string; message?: string };
}

const operationSchema = joi
  .object<AnalyzeOperation>({
    status: joi.string().valid('notStarted', 'running', 'succeeded', 'failed', 'canceled').required(),
    analyzeResult: joi
      .object({
        content: joi.string().allow(''),
        documents: joi.array().items(joi.object({ fields: joi.object() }).unknown(true)),
      })
      .unknown(true),
    error: joi.object({ code: joi.string(), message: joi.string() }).unknown(true),
  })
  .unknown(true);

export class DocumentAnalysisError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DocumentAnalysisError';
  }
}

/**
 * Client for the Document Intelligence prebuilt invoice model: submits the
 * document, polls the operation and flattens the first detected invoice.
 */
@Injectable()
export class DocumentIntelligenceService {
  private readonly logger = new Logger(DocumentIntelligenceService.name);
  private readonly endpoint = envs.docIntelEndpoint;
  private readonly key = envs.docIntelKey;

  async analyzeInvoice(buffer: Buffer): Promise<InvoiceAnalysis> {
    try {
      const url =
        `${this.endpoint}/documentintelligence/documentModels/${envs.docIntelModel}:analyze` +
        `?api-version=${envs.docIntelApiVersion}`;

      const postResp = await fetch(url, {
        method: 'POST',
        headers: {
          'Ocp-Apim-Subscription-Key': this.key,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ base64Source: buffer.toString('base64') }),
      });

      if (postResp.status !== 202 && !postResp.ok) {
        throw new DocumentAnalysisError(
          `Analyze request rejected (${postResp.status}): ${await postResp.text()}`,
        );
      }

      const operationLocation = postResp.headers.get('Operation-Location');
      if (!operationLocation) {
        throw new DocumentAnalysisError('Missing Operation-Location header');
      }

      const operation = await this.poll(operationLocation);
      const document = operation.analyzeResult?.documents?.[0];

      if (!document) {
        throw new DocumentAnalysisError('No invoice document detected');
      }

      return this.flatten(document.fields ?? {}, operation.analyzeResult?.content ?? null);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Document analysis failed: ${message}`);
      throw error instanceof DocumentAnalysisError ? error : new DocumentAnalysisError(message);
    }
  }

  private async poll(operationLocation: string): Promise<AnalyzeOperation> {
    for (let attempt = 1; attempt <= envs.docIntelMaxPolls; attempt++) {
      const getResp = await fetch(operationLocation, {
        method: 'GET',
        headers: { 'Ocp-Apim-Subscription-Key': this.key },
      });

      if (!getResp.ok) {
        throw new DocumentAnalysisError(
          `Polling failed (${getResp.status}): ${await getResp.text()}`,
        );
      }

      const { error, value } = operationSchema.validate(await getResp.json());
      if (error) {
        throw new DocumentAnalysisError(`Unexpected analysis response: ${error.message}`);
      }

      if (value.status === 'succeeded') {
        return value;
      }

      if (value.status === 'failed' || value.status === 'canceled') {
        throw new DocumentAnalysisError(
          value.error?.message ?? `Analysis ${value.status}`,
        );
      }

      await new Promise((r) => setTimeout(r, envs.docIntelPollIntervalMs));
    }

    throw new DocumentAnalysisError(`Analysis still running after ${envs.docIntelMaxPolls} polls`);
  }

  private flatten(fields: Record<string, DocumentField>, content: string | null): InvoiceAnalysis {
    const items = (fields['Items']?.valueArray ?? []).map((item): AnalyzedLineItem => {
      const o = item.valueObject ?? {};
      return {
        description: text(o['Description']),
        sku: text(o['ProductCode']),
        quantity: amount(o['Quantity']),
        unit: text(o['Unit']),
        unitPrice: amount(o['UnitPrice']),
        lineTotal: amount(o['Amount']),
        taxAmount: amount(o['Tax']),
        date: text(o['Date']),
      };
    });

    return {
      vendorName: text(fields['VendorName']),
      vendorAddress: text(fields['VendorAddress']),
      invoiceNumber: text(fields['InvoiceId']),
      invoiceDate: text(fields['InvoiceDate']),
      dueDate: text(fields['DueDate']),
      currency:
        normalizeText(fields['InvoiceTotal']?.valueCurrency?.currencyCode) ??
        text(fields['CurrencyCode']),
      subtotal: amount(fields['SubTotal']),
      taxTotal: amount(fields['TotalTax']),
      total: amount(fields['InvoiceTotal']),
      customerName: text(fields['CustomerName']),
      customerAddress: text(fields['CustomerAddress']),
      items,
      content: normalizeText(content),
    };
  }
}

const text = (field?: DocumentField): string | null =>
  normalizeText(field?.valueString) ?? normalizeText(field?.valueDate) ?? normalizeText(field?.content);

const amount = (field?: DocumentField): number | null => {
  if (!field) return null;
  if (typeof field.valueCurrency?.amount === 'number') return field.valueCurrency.amount;
  if (typeof field.valueNumber === 'number') return field.valueNumber;
  if (typeof field.valueInteger === 'number') return field.valueInteger;
  return normalizeNumber(field.content);
};
