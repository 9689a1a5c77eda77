import { IsInt, IsOptional, IsString } from 'class-validator';

export class GetInvoiceDto {
  @IsInt()
  id!: number;
}

export class DeleteInvoiceDto extends GetInvoiceDto {
  @IsOptional()
  @IsString()
  deletedBy?: string;
}
