import { Controller } from '@nestjs/common';
import { MessagePattern, Payload } from '@nestjs/microservices';

import { PricesSubjects } from '../../config';
import { PriceChangeHistoryDto, PriceLedgerDto } from './dto';
import { PriceChangesService } from './price-changes.service';
import { PriceLedgerService } from './price-ledger.service';

@Controller()
export class PricesController {
  constructor(
    private readonly priceChangesService: PriceChangesService,
    private readonly priceLedgerService: PriceLedgerService,
  ) {}

  @MessagePattern(PricesSubjects.pendingChanges)
  pending() {
    return this.priceChangesService.listPending();
  }

  @MessagePattern(PricesSubjects.history)
  history(@Payload() payload: PriceChangeHistoryDto) {
    return this.priceChangesService.history(payload.vendorName, payload.limit);
  }

  @MessagePattern(PricesSubjects.ledger)
  ledger(@Payload() payload: PriceLedgerDto) {
    return this.priceLedgerService.vendorHistory(payload.vendorName);
  }
}
