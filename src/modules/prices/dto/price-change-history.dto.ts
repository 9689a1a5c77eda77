import { IsInt, IsOptional, IsString, Max, Min } from 'class-validator';

export class PriceChangeHistoryDto {
  @IsOptional()
  @IsString()
  vendorName?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(1000)
  limit?: number;
}
