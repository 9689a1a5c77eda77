import { IsInt, IsNotEmpty, IsOptional, IsString } from 'class-validator';

export class ApproveInvoiceDto {
  @IsInt()
  invoiceId!: number;

  @IsString()
  @IsNotEmpty()
  reviewer!: string;

  @IsOptional()
  @IsString()
  notes?: string;

  @IsOptional()
  @IsInt()
  expectedVersion?: number;
}

export class RejectInvoiceDto {
  @IsInt()
  invoiceId!: number;

  @IsString()
  @IsNotEmpty()
  reviewer!: string;

  @IsString()
  @IsNotEmpty()
  notes!: string;

  @IsOptional()
  @IsInt()
  expectedVersion?: number;
}

export class DeptQueueDto {
  @IsString()
  @IsNotEmpty()
  reviewer!: string;
}
