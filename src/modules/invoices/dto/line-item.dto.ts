import { IsNumber, IsOptional, IsString } from 'class-validator';

import type { LineItem } from '../interfaces';

export class LineItemDto {
  @IsOptional()
  @IsString()
  description?: string;

  @IsOptional()
  @IsString()
  sku?: string;

  @IsOptional()
  @IsNumber()
  quantity?: number;

  @IsOptional()
  @IsString()
  unit?: string;

  @IsOptional()
  @IsNumber()
  unitPrice?: number;

  @IsOptional()
  @IsNumber()
  lineTotal?: number;

  @IsOptional()
  @IsNumber()
  taxAmount?: number;
}

export const toLineItem = (dto: LineItemDto): LineItem => ({
  description: dto.description?.trim() || null,
  sku: dto.sku?.trim() || null,
  quantity: dto.quantity ?? null,
  unit: dto.unit?.trim() || null,
  unitPrice: dto.unitPrice ?? null,
  lineTotal: dto.lineTotal ?? null,
  taxAmount: dto.taxAmount ?? null,
});
