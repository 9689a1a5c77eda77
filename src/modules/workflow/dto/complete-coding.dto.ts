import { Type } from 'class-transformer';
import { IsArray, IsInt, IsNumber, IsOptional, IsString, ValidateNested } from 'class-validator';

import { LineItemDto } from '../../invoices/dto';

export class TaxFieldsDto {
  @IsOptional()
  @IsNumber()
  gst?: number;

  @IsOptional()
  @IsNumber()
  pst?: number;

  @IsOptional()
  @IsNumber()
  hst?: number;

  @IsOptional()
  @IsNumber()
  qst?: number;

  @IsOptional()
  @IsNumber()
  usTax?: number;

  @IsOptional()
  @IsNumber()
  taxTotal?: number;

  @IsOptional()
  @IsString()
  taxNotes?: string;
}

export class CompleteCodingDto {
  @IsInt()
  invoiceId!: number;

  @IsString()
  coder!: string;

  @IsString()
  glAccount!: string;

  @IsString()
  department!: string;

  @IsOptional()
  @IsString()
  costCenter?: string;

  @IsOptional()
  @IsString()
  poNumber?: string;

  @IsOptional()
  @IsString()
  receiptNumber?: string;

  @IsOptional()
  @IsString()
  notes?: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => TaxFieldsDto)
  tax?: TaxFieldsDto;

  /** Corrected line items, accepted only before the first department review. */
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => LineItemDto)
  lineItems?: LineItemDto[];

  @IsOptional()
  @IsInt()
  expectedVersion?: number;
}
