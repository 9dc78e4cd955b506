import { Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import { FfmpegService } from '../../providers/ffmpeg/ffmpeg.service';
import { CountingGate } from './counting-gate';
import { SegmentTranscriberService } from './segment-transcriber.service';
import { SegmentJob, SegmentTextResult } from './transcription.types';
import { buildPlaceholder, errorMessage } from './transcript-text';

export const PAYLOAD_TOO_LARGE_AFTER_SPLITS = 'payload-too-large-after-splits';
export const PAYLOAD_ERROR_PERSISTENT = 'payload-error-persistent';

@Injectable()
export class RecursiveSplitterService {
  private readonly logger = new Logger(RecursiveSplitterService.name);

  constructor(
    private ffmpegService: FfmpegService,
    private segmentTranscriber: SegmentTranscriberService,
  ) {}

  /**
   * 对负载过大的片段按时间对半切分并重新转录，直到体积达标或达到深度上限
   * 返回按时间顺序排列的叶子结果（左半在前）
   */
  async splitAndTranscribe(
    job: SegmentJob,
    depth: number,
    maxDepth: number,
    payloadSizeCap: number,
    gate?: CountingGate,
  ): Promise<SegmentTextResult[]> {
    const size = await this.fileSize(job.path);

    if (size <= payloadSizeCap) {
      // 体积已达标：只调用一次，不再重试，也不再继续切分
      const result = await this.withGate(gate, () => this.segmentTranscriber.transcribe(job, 0));
      if (result.kind === 'split') {
        return [this.placeholder(job, PAYLOAD_ERROR_PERSISTENT)];
      }
      return [result];
    }

    if (depth >= maxDepth) {
      this.logger.warn(`Segment ${job.index} still ${size} bytes at depth ${depth}, giving up`);
      return [this.placeholder(job, PAYLOAD_TOO_LARGE_AFTER_SPLITS)];
    }

    const duration = (await this.ffmpegService.probeDuration(job.path)) || job.endOffset - job.startOffset || 1.0;
    const half = duration / 2;
    const leftPath = `${job.path}_partL.mp3`;
    const rightPath = `${job.path}_partR.mp3`;

    this.logger.log(
      `Splitting segment ${job.index} range ${job.startOffset.toFixed(2)}-${job.endOffset.toFixed(2)}s at depth ${depth}`,
    );

    try {
      await this.ffmpegService.encodeSlice(job.path, leftPath, 0, half);
      await this.ffmpegService.encodeSlice(job.path, rightPath, half, duration - half);
    } catch (err) {
      this.logger.error(`Split of segment ${job.index} failed: ${errorMessage(err)}`);
      return [this.placeholder(job, `split-failed: ${errorMessage(err)}`)];
    }

    const left: SegmentJob = {
      path: leftPath,
      startOffset: job.startOffset,
      endOffset: job.startOffset + half,
      depth: depth + 1,
      index: job.index,
    };
    const right: SegmentJob = {
      path: rightPath,
      startOffset: job.startOffset + half,
      endOffset: job.endOffset,
      depth: depth + 1,
      index: job.index,
    };

    const leftResults = await this.splitAndTranscribe(left, depth + 1, maxDepth, payloadSizeCap, gate);
    const rightResults = await this.splitAndTranscribe(right, depth + 1, maxDepth, payloadSizeCap, gate);
    return [...leftResults, ...rightResults];
  }

  private placeholder(job: SegmentJob, reason: string): SegmentTextResult {
    return {
      kind: 'text',
      index: job.index,
      text: buildPlaceholder(job.startOffset, job.endOffset, reason),
      startOffset: job.startOffset,
      endOffset: job.endOffset,
    };
  }

  private withGate<T>(gate: CountingGate | undefined, task: () => Promise<T>): Promise<T> {
    return gate ? gate.run(task) : task();
  }

  private async fileSize(path: string): Promise<number> {
    try {
      const { size } = await fs.stat(path);
      return size;
    } catch {
      return 0;
    }
  }
}
