import { Injectable, Logger } from '@nestjs/common';
import { CountingGate } from './counting-gate';
import { RecursiveSplitterService } from './recursive-splitter.service';
import { SegmentTranscriberService } from './segment-transcriber.service';
import { SegmentJob, SegmentTextResult, Transcript, TranscriptionOptions } from './transcription.types';

export type SchedulerOptions = Pick<
  TranscriptionOptions,
  'maxConcurrency' | 'maxRetries' | 'maxPayloadSize' | 'maxSplitDepth'
>;

export const LEAF_SEPARATOR = '\n\n';

@Injectable()
export class ConcurrencySchedulerService {
  private readonly logger = new Logger(ConcurrencySchedulerService.name);

  constructor(
    private segmentTranscriber: SegmentTranscriberService,
    private recursiveSplitter: RecursiveSplitterService,
  ) {}

  /**
   * 并发转录所有顶层片段，远端调用数受同一个计数信号量约束
   * 切分子树的远端调用同样经过该信号量
   */
  async run(jobs: SegmentJob[], options: SchedulerOptions): Promise<Transcript> {
    if (jobs.length === 0) {
      return { text: '', leaves: [] };
    }

    const gate = new CountingGate(options.maxConcurrency);
    const perJob = await Promise.all(jobs.map((job) => this.runJob(job, gate, options)));

    // Array.prototype.sort 是稳定排序，同起点时保留左先右后的顺序
    const leaves = perJob.flat().sort((a, b) => a.startOffset - b.startOffset);
    this.logger.log(
      `Transcribed ${jobs.length} segments into ${leaves.length} leaves (peak in-flight ${gate.maxObserved})`,
    );

    return {
      text: leaves.map((leaf) => leaf.text).join(LEAF_SEPARATOR),
      leaves,
    };
  }

  private async runJob(job: SegmentJob, gate: CountingGate, options: SchedulerOptions): Promise<SegmentTextResult[]> {
    const result = await gate.run(() => this.segmentTranscriber.transcribe(job, options.maxRetries));
    if (result.kind === 'text') {
      return [result];
    }

    this.logger.log(
      `Starting recursive split for segment index=${result.index} range ${result.startOffset.toFixed(2)}-${result.endOffset.toFixed(2)}s`,
    );
    return this.recursiveSplitter.splitAndTranscribe(job, 0, options.maxSplitDepth, options.maxPayloadSize, gate);
  }
}
