import { Module } from '@nestjs/common';

import { NatsModule } from '../../transports/nats.module';
import { DepartmentsModule } from '../departments/departments.module';
import { InvoicesModule } from '../invoices/invoices.module';
import { PricesModule } from '../prices/prices.module';
import { PriceReviewController } from './price-review.controller';
import { PriceReviewService } from './price-review.service';
import { WorkflowController } from './workflow.controller';
import { WorkflowService } from './workflow.service';

@Module({
  imports: [NatsModule, DepartmentsModule, InvoicesModule, PricesModule],
  controllers: [WorkflowController, PriceReviewController],
  providers: [WorkflowService, PriceReviewService],
})
export class WorkflowModule {}
