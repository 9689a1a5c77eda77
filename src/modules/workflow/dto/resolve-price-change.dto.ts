import { IsIn, IsInt, IsNotEmpty, IsOptional, IsString } from 'class-validator';

import type { ReviewDecision } from '../../invoices/interfaces';

export const REVIEW_DECISIONS = ['acknowledged', 'escalated'] as const satisfies readonly ReviewDecision[];

export class ResolvePriceChangeDto {
  @IsInt()
  changeId!: number;

  @IsString()
  @IsNotEmpty()
  reviewer!: string;

  @IsIn(REVIEW_DECISIONS)
  decision!: ReviewDecision;

  @IsOptional()
  @IsString()
  notes?: string;
}

export class ResolvePriceChangesBulkDto {
  @IsInt()
  invoiceId!: number;

  @IsString()
  @IsNotEmpty()
  reviewer!: string;

  @IsIn(REVIEW_DECISIONS)
  decision!: ReviewDecision;

  @IsOptional()
  @IsString()
  notes?: string;
}
