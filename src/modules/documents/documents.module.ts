import { Module } from '@nestjs/common';

import { NatsModule } from '../../transports/nats.module';
import { InvoicesModule } from '../invoices/invoices.module';
import { TaxModule } from '../tax/tax.module';
import { DocumentIntelligenceService } from './document-intelligence.service';
import { DocumentsController } from './documents.controller';
import { DocumentsService } from './documents.service';

@Module({
  imports: [NatsModule, InvoicesModule, TaxModule],
  controllers: [DocumentsController],
  providers: [DocumentsService, DocumentIntelligenceService],
})
export class DocumentsModule {}
