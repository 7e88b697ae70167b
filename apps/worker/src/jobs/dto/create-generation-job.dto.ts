import { Type } from 'class-transformer';
import {
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Matches,
  Max,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator';

/** Optional knobs forwarded to the generation model */
export class GenerationParametersDto {
  @IsOptional()
  @IsInt()
  @Min(64)
  @Max(2048)
  width?: number;

  @IsOptional()
  @IsInt()
  @Min(64)
  @Max(2048)
  height?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(100)
  steps?: number;

  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  @Max(30)
  guidanceScale?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(Number.MAX_SAFE_INTEGER)
  seed?: number;
}

/**
 * Request to create a generation job.
 *
 * `model` is either the alias "stable-diffusion" (the provider default),
 * "owner/name" or "owner/name:version".
 */
export class CreateGenerationJobDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(2000)
  prompt!: string;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  @Matches(/^(stable-diffusion|[\w.-]+\/[\w.-]+(:\w+)?)$/, {
    message: 'model must be "stable-diffusion", "owner/name" or "owner/name:version"',
  })
  model?: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => GenerationParametersDto)
  parameters?: GenerationParametersDto;
}
