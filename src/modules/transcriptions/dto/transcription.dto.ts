import { ProcessFileResult } from '../../transcription/transcription-pipeline.service';
import { SegmentStrategy, TranscriptionOptions } from '../../transcription/transcription.types';

/**
 * 队列任务数据
 */
export interface TranscriptionJobData {
  source_path: string;
  segment_strategy?: SegmentStrategy;
  options: Partial<TranscriptionOptions>;
}

export type TranscriptionJobResult = ProcessFileResult;

export interface TranscriptionResponseDto {
  job_id: string;
  status: string;
  source_path: string;
  result: TranscriptionJobResult | null;
  error: { code: string; message: string } | null;
  retry_after?: number;
  created_at: string;
}
