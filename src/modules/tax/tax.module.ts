import { Module } from '@nestjs/common';

import { TaxClassifierService } from './tax-classifier.service';

@Module({
  providers: [TaxClassifierService],
  exports: [TaxClassifierService],
})
export class TaxModule {}
