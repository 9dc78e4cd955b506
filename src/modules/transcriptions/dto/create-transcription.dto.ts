import { IsString, IsNotEmpty, IsOptional, IsInt, IsIn, Min, Max } from 'class-validator';
import { SegmentStrategy } from '../../transcription/transcription.types';

export class CreateTranscriptionDto {
  @IsString()
  @IsNotEmpty()
  source_path!: string;

  @IsIn(['time', 'size'])
  @IsOptional()
  segment_strategy?: SegmentStrategy;

  @IsInt()
  @Min(1)
  @IsOptional()
  segment_seconds?: number;

  @IsInt()
  @Min(1)
  @Max(32)
  @IsOptional()
  max_concurrency?: number;

  @IsInt()
  @Min(0)
  @Max(10)
  @IsOptional()
  max_retries?: number;

  @IsInt()
  @Min(1)
  @IsOptional()
  max_payload_size?: number;

  @IsInt()
  @Min(0)
  @Max(10)
  @IsOptional()
  max_split_depth?: number;
}

export interface CreateTranscriptionResponseDto {
  job_id: string;
  status: string;
  retry_after: number;
}
