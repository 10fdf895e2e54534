import { IsInt, IsNotEmpty, IsOptional, IsString, MaxLength, Min } from 'class-validator';

export class ExtractInvoiceDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  task_id!: string;

  /** 1-based; omitted means every page */
  @IsOptional()
  @IsInt()
  @Min(1)
  page_number?: number;
}
