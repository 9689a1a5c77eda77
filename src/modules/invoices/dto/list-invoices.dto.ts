import { IsIn, IsOptional, IsString } from 'class-validator';

import type { InvoiceStatus } from '../interfaces';
import { INVOICE_STATUSES } from '../invoice-state';

export class ListInvoicesDto {
  @IsOptional()
  @IsIn(INVOICE_STATUSES)
  status?: InvoiceStatus;

  @IsOptional()
  @IsString()
  vendorName?: string;
}
