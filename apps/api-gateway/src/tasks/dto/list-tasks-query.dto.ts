import { IsEnum, IsInt, IsOptional, Min } from 'class-validator';
import { TaskStatus } from '@invoice-ocr/tasks';

export const MAX_PER_PAGE = 100;

export class ListTasksQueryDto {
  @IsOptional()
  @IsInt()
  @Min(1)
  page: number = 1;

  /** Values above MAX_PER_PAGE are clamped, not rejected */
  @IsOptional()
  @IsInt()
  @Min(1)
  per_page: number = 20;

  @IsOptional()
  @IsEnum(TaskStatus)
  status?: TaskStatus;
}
