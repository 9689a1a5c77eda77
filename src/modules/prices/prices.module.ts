import { Module } from '@nestjs/common';

import { PriceChangeDetectorService } from './price-change-detector.service';
import { PriceChangesService } from './price-changes.service';
import { PriceLedgerService } from './price-ledger.service';
import { PricesController } from './prices.controller';

@Module({
  controllers: [PricesController],
  providers: [PriceLedgerService, PriceChangeDetectorService, PriceChangesService],
  exports: [PriceLedgerService, PriceChangeDetectorService, PriceChangesService],
})
export class PricesModule {}
