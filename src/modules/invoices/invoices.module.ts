import { Module } from '@nestjs/common';

import { NatsModule } from '../../transports/nats.module';
import { PricesModule } from '../prices/prices.module';
import { InvoicesController } from './invoices.controller';
import { InvoicesRepository } from './invoices.repository';
import { InvoicesService } from './invoices.service';

@Module({
  imports: [NatsModule, PricesModule],
  controllers: [InvoicesController],
  providers: [InvoicesService, InvoicesRepository],
  exports: [InvoicesRepository],
})
export class InvoicesModule {}
