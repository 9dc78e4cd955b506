import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { setTimeout as sleep } from 'timers/promises';
import { REMOTE_TRANSCRIBER, RemoteTranscriber, SegmentJob, SegmentResult } from './transcription.types';
import { buildPlaceholder, cleanInvisibleCharacters, errorMessage, isPayloadSizeError } from './transcript-text';

type AttemptOutcome =
  | { status: 'success'; text: string }
  | { status: 'retryable'; error: string }
  | { status: 'payload-too-large'; error: string };

@Injectable()
export class SegmentTranscriberService {
  private readonly logger = new Logger(SegmentTranscriberService.name);
  private readonly backoffUnitMs: number;

  constructor(
    @Inject(REMOTE_TRANSCRIBER) private remote: RemoteTranscriber,
    private configService: ConfigService,
  ) {
    this.backoffUnitMs = this.configService.get<number>('transcription.retryBackoffMs') ?? 1000;
  }

  /**
   * 转录单个片段
   * 普通失败最多重试 maxRetries 次（线性退避），负载过大时立即返回切分信号
   */
  async transcribe(job: SegmentJob, maxRetries: number): Promise<SegmentResult> {
    const attempts = Math.max(0, maxRetries) + 1;
    let lastError: string | null = null;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      this.logger.log(`Transcribing segment ${job.index} attempt ${attempt}/${attempts}: ${job.path}`);
      const outcome = await this.attempt(job);

      if (outcome.status === 'success') {
        return {
          kind: 'text',
          index: job.index,
          text: outcome.text,
          startOffset: job.startOffset,
          endOffset: job.endOffset,
        };
      }

      if (outcome.status === 'payload-too-large') {
        this.logger.warn(`Payload error detected for segment ${job.index}: ${outcome.error}. Marking for split.`);
        return {
          kind: 'split',
          index: job.index,
          path: job.path,
          startOffset: job.startOffset,
          endOffset: job.endOffset,
          depth: job.depth,
        };
      }

      lastError = outcome.error;
      this.logger.warn(`Error segment ${job.index} attempt ${attempt}: ${outcome.error}`);

      if (attempt < attempts) {
        await sleep(attempt * this.backoffUnitMs);
      }
    }

    this.logger.error(`Segment ${job.index} failed after ${attempts} attempts: ${lastError}`);
    return {
      kind: 'text',
      index: job.index,
      text: buildPlaceholder(job.startOffset, job.endOffset, lastError),
      startOffset: job.startOffset,
      endOffset: job.endOffset,
    };
  }

  private async attempt(job: SegmentJob): Promise<AttemptOutcome> {
    try {
      const collected: string[] = [];
      for await (const chunk of this.remote.transcribe(job.path, { diarize: true })) {
        collected.push(cleanInvisibleCharacters(chunk));
      }
      const text = collected.join('\n').trim();
      return text ? { status: 'success', text } : { status: 'retryable', error: 'empty transcription' };
    } catch (err) {
      const message = errorMessage(err);
      if (isPayloadSizeError(message)) {
        return { status: 'payload-too-large', error: message };
      }
      return { status: 'retryable', error: message };
    }
  }
}
