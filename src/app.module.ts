import { Module } from '@nestjs/common';

import { DatabaseModule } from './database/database.module';
import { DocumentsModule } from './modules/documents/documents.module';
import { InvoicesModule } from './modules/invoices/invoices.module';
import { PricesModule } from './modules/prices/prices.module';
import { WorkflowModule } from './modules/workflow/workflow.module';
import { NatsModule } from './transports/nats.module';

@Module({
  imports: [
    DatabaseModule,
    NatsModule,
    InvoicesModule,
    WorkflowModule,
    PricesModule,
    DocumentsModule,
  ],
})
export class AppModule {}
