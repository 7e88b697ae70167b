import { IsEnum, IsInt, IsOptional, Max, Min } from 'class-validator';
import { GenerationJobStatus } from '@genforge/database';

export const DEFAULT_LIST_LIMIT = 50;
export const MAX_LIST_LIMIT = 100;

export class ListGenerationJobsDto {
  @IsOptional()
  @IsEnum(GenerationJobStatus)
  status?: GenerationJobStatus;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(MAX_LIST_LIMIT)
  limit?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  offset?: number;
}
