import { Controller } from '@nestjs/common';
import { MessagePattern, Payload } from '@nestjs/microservices';

import { PricesSubjects } from '../../config';
import { ResolvePriceChangeDto, ResolvePriceChangesBulkDto } from './dto';
import { PriceReviewService } from './price-review.service';

@Controller()
export class PriceReviewController {
  constructor(private readonly priceReviewService: PriceReviewService) {}

  @MessagePattern(PricesSubjects.resolveChange)
  resolve(@Payload() payload: ResolvePriceChangeDto) {
    return this.priceReviewService.resolve(payload);
  }

  @MessagePattern(PricesSubjects.resolveBulk)
  resolveBulk(@Payload() payload: ResolvePriceChangesBulkDto) {
    return this.priceReviewService.resolveBulk(payload);
  }
}
