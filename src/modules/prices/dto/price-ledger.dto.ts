import { IsNotEmpty, IsString } from 'class-validator';

export class PriceLedgerDto {
  @IsString()
  @IsNotEmpty()
  vendorName!: string;
}
