import { Test, type TestingModule } from '@nestjs/testing';

import { NATS_SERVICE } from '../src/config';
import { DatabaseService } from '../src/database/database.service';
import { DEPARTMENT_DIRECTORY, parseDepartmentDirectory } from '../src/modules/departments/departments.config';
import { DepartmentsService } from '../src/modules/departments/departments.service';
import { DocumentIntelligenceService } from '../src/modules/documents/document-intelligence.service';
import { DocumentsService } from '../src/modules/documents/documents.service';
import type { LineItemDto } from '../src/modules/invoices/dto';
import { InvoicesRepository } from '../src/modules/invoices/invoices.repository';
import { InvoicesService } from '../src/modules/invoices/invoices.service';
import { PriceChangeDetectorService } from '../src/modules/prices/price-change-detector.service';
import { PriceChangesService } from '../src/modules/prices/price-changes.service';
import { PriceLedgerService } from '../src/modules/prices/price-ledger.service';
import { TaxClassifierService } from '../src/modules/tax/tax-classifier.service';
import { PriceReviewService } from '../src/modules/workflow/price-review.service';
import { WorkflowService } from '../src/modules/workflow/workflow.service';

export const TEST_DEPARTMENTS = {
  kitchen: 'chef.test',
  dairy: 'dairy.test',
  bar: 'bar.test',
};

export interface TestContext {
  moduleRef: TestingModule;
  database: DatabaseService;
  emit: jest.Mock;
}

/** Every service wired against a fresh in-memory database and a stubbed NATS client. */
export async function createTestContext(): Promise<TestContext> {
  const emit = jest.fn();

  const moduleRef = await Test.createTestingModule({
    providers: [
      { provide: NATS_SERVICE, useValue: { emit } },
      {
        provide: DatabaseService,
        useFactory: () => {
          const database = new DatabaseService(':memory:');
          database.migrate();
          return database;
        },
      },
      { provide: DEPARTMENT_DIRECTORY, useValue: parseDepartmentDirectory(TEST_DEPARTMENTS) },
      DepartmentsService,
      TaxClassifierService,
      InvoicesRepository,
      InvoicesService,
      PriceLedgerService,
      PriceChangeDetectorService,
      PriceChangesService,
      WorkflowService,
      PriceReviewService,
      DocumentIntelligenceService,
      DocumentsService,
    ],
  }).compile();

  return { moduleRef, database: moduleRef.get(DatabaseService), emit };
}

export const line = (description: string, unitPrice?: number, quantity = 1): LineItemDto => ({
  description,
  quantity,
  unitPrice,
});
