import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';

export class RawRecordDto {
  @IsString()
  @IsNotEmpty()
  id!: string;

  // Free text; null and empty strings are legitimate inputs.
  @IsString()
  @IsOptional()
  sex?: string | null;

  @IsString()
  @IsOptional()
  race?: string | null;

  @IsString()
  @IsOptional()
  age?: string | null;
}

export class RunCleansingDto {
  @IsArray()
  @ArrayMinSize(1)
  @ArrayMaxSize(5000) // every record may cost up to three model calls
  @ValidateNested({ each: true })
  @Type(() => RawRecordDto)
  records!: RawRecordDto[];

  // Can only lower the configured cap; larger values are clamped by the service.
  @IsInt()
  @IsOptional()
  @Min(1)
  @Max(32)
  concurrency?: number;
}
