import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsNumber,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';

import { LineItemDto } from './line-item.dto';

export class ImportedInvoiceDto {
  @IsString()
  vendorName!: string;

  @IsOptional()
  @IsString()
  invoiceNumber?: string;

  @IsOptional()
  @IsString()
  invoiceDate?: string;

  @IsOptional()
  @IsString()
  department?: string;

  @IsOptional()
  @IsString()
  currency?: string;

  @IsOptional()
  @IsNumber()
  subtotal?: number;

  @IsOptional()
  @IsNumber()
  totalAmount?: number;

  @IsOptional()
  @IsNumber()
  taxTotal?: number;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => LineItemDto)
  lineItems!: LineItemDto[];
}

export class ImportInvoicesDto {
  @IsString()
  importedBy!: string;

  @IsArray()
  @ArrayMinSize(1, { message: 'A batch must contain at least one invoice' })
  @ArrayMaxSize(500, { message: 'A batch holds at most 500 invoices' })
  @ValidateNested({ each: true })
  @Type(() => ImportedInvoiceDto)
  invoices!: ImportedInvoiceDto[];
}
