import { Injectable, Logger, BadRequestException, NotFoundException } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import { Queue } from 'bullmq';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import { v4 as uuidv4 } from 'uuid';
import { ErrorCode } from '../../common/interfaces/response.interface';
import { TranscriptionOptions } from '../transcription/transcription.types';
import { CreateTranscriptionDto, CreateTranscriptionResponseDto } from './dto/create-transcription.dto';
import { TranscriptionJobData, TranscriptionJobResult, TranscriptionResponseDto } from './dto/transcription.dto';
import { TRANSCRIPTIONS_QUEUE } from './constants';

@Injectable()
export class TranscriptionsService {
  private readonly logger = new Logger(TranscriptionsService.name);
  private readonly pollInterval: number;

  constructor(
    @InjectQueue(TRANSCRIPTIONS_QUEUE) private transcriptionsQueue: Queue<TranscriptionJobData, TranscriptionJobResult>,
    private configService: ConfigService,
  ) {
    this.pollInterval = this.configService.get<number>('transcription.pollIntervalSeconds') || 5;
  }

  /**
   * 创建转录任务并入队
   */
  async createTranscription(dto: CreateTranscriptionDto): Promise<CreateTranscriptionResponseDto> {
    try {
      await fs.access(dto.source_path);
    } catch {
      throw new BadRequestException({
        code: ErrorCode.INVALID_INPUT,
        message: `源文件不存在: ${dto.source_path}`,
      });
    }

    const jobId = uuidv4();
    const options: Partial<TranscriptionOptions> = {
      segmentSeconds: dto.segment_seconds,
      maxConcurrency: dto.max_concurrency,
      maxRetries: dto.max_retries,
      maxPayloadSize: dto.max_payload_size,
      maxSplitDepth: dto.max_split_depth,
    };

    await this.transcriptionsQueue.add(
      'transcribe',
      {
        source_path: dto.source_path,
        segment_strategy: dto.segment_strategy,
        options,
      },
      {
        jobId,
        // 每次重跑都从头切分转录，不复用上一次的中间结果
        attempts: 2,
        backoff: {
          type: 'exponential',
          delay: 5000,
        },
      },
    );

    this.logger.log(`Transcription queued: ${jobId} (${dto.source_path})`);

    return {
      job_id: jobId,
      status: 'waiting',
      retry_after: this.pollInterval,
    };
  }

  /**
   * 获取任务状态与结果
   */
  async getTranscription(jobId: string): Promise<TranscriptionResponseDto> {
    const job = await this.transcriptionsQueue.getJob(jobId);
    if (!job) {
      throw new NotFoundException({
        code: ErrorCode.NOT_FOUND,
        message: '任务不存在',
      });
    }

    const status = await job.getState();
    const response: TranscriptionResponseDto = {
      job_id: jobId,
      status,
      source_path: job.data.source_path,
      result: status === 'completed' ? job.returnvalue : null,
      error: status === 'failed' && job.failedReason
        ? { code: ErrorCode.ENGINE_ERROR, message: job.failedReason }
        : null,
      created_at: new Date(job.timestamp).toISOString(),
    };

    // 进行中的任务添加 retry_after
    if (status !== 'completed' && status !== 'failed') {
      response.retry_after = this.pollInterval;
    }

    return response;
  }
}
