import { Processor, WorkerHost, OnWorkerEvent } from '@nestjs/bullmq';
import { Logger } from '@nestjs/common';
import { Job } from 'bullmq';
import { TranscriptionPipelineService } from '../transcription/transcription-pipeline.service';
import { TranscriptionJobData, TranscriptionJobResult } from './dto/transcription.dto';
import { TRANSCRIPTIONS_QUEUE } from './constants';

// 一次只处理一个源文件，片段级并发由调度器控制
@Processor(TRANSCRIPTIONS_QUEUE, { concurrency: 1 })
export class TranscriptionsProcessor extends WorkerHost {
  private readonly logger = new Logger(TranscriptionsProcessor.name);

  constructor(private pipelineService: TranscriptionPipelineService) {
    super();
  }

  async process(job: Job<TranscriptionJobData, TranscriptionJobResult>): Promise<TranscriptionJobResult> {
    this.logger.log(`Processing job ${job.id}: ${job.data.source_path}`);
    return this.pipelineService.processFile(job.data.source_path, {
      ...job.data.options,
      segmentStrategy: job.data.segment_strategy,
    });
  }

  @OnWorkerEvent('failed')
  onFailed(job: Job<TranscriptionJobData, TranscriptionJobResult>, error: Error) {
    this.logger.error(`Job ${job.id} failed: ${error.message}`);
  }
}
