import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import { basename, extname, join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { defaultWorkRoot } from '../../common/config/configuration';
import { FfmpegService } from '../../providers/ffmpeg/ffmpeg.service';
import { ConcurrencySchedulerService } from './concurrency-scheduler.service';
import { SEGMENT_OUTPUT_PATTERN, SegmentStoreService } from './segment-store.service';
import { SegmentStrategy, TranscribeSegmentsResult, TranscriptionOptions } from './transcription.types';

export interface ProcessFileOptions extends Partial<TranscriptionOptions> {
  segmentStrategy?: SegmentStrategy;
  /** 跳过转码和切分，直接使用 workDir 中已有的 seg###.mp3 */
  bypassSplit?: boolean;
  workDir?: string;
  keepWorkDir?: boolean;
}

export interface ProcessFileResult extends TranscribeSegmentsResult {
  transcriptPath: string;
}

@Injectable()
export class TranscriptionPipelineService {
  private readonly logger = new Logger(TranscriptionPipelineService.name);

  constructor(
    private configService: ConfigService,
    private ffmpegService: FfmpegService,
    private segmentStore: SegmentStoreService,
    private scheduler: ConcurrencySchedulerService,
  ) {}

  /**
   * 配置中的默认参数，调用方传入的值优先
   */
  resolveOptions(overrides: Partial<TranscriptionOptions> = {}): TranscriptionOptions {
    const get = (key: keyof TranscriptionOptions, fallback: number): number =>
      overrides[key] ?? this.configService.get<number>(`transcription.${key}`) ?? fallback;

    return {
      segmentSeconds: get('segmentSeconds', 600),
      maxConcurrency: get('maxConcurrency', 2),
      maxRetries: get('maxRetries', 2),
      maxPayloadSize: get('maxPayloadSize', 8 * 1024 * 1024),
      maxSplitDepth: get('maxSplitDepth', 3),
    };
  }

  /**
   * 转录工作目录中的一组片段文件，返回拼接后的全文和实际处理的片段列表
   */
  async transcribeSegments(
    workDir: string,
    segmentNames: string[],
    overrides: Partial<TranscriptionOptions> = {},
  ): Promise<TranscribeSegmentsResult> {
    if (segmentNames.length === 0) {
      return { text: '', segments: [] };
    }

    const options = this.resolveOptions(overrides);
    const segments = [...segmentNames].sort();
    const jobs = await this.segmentStore.buildJobs(workDir, segments, options.segmentSeconds);
    const transcript = await this.scheduler.run(jobs, options);

    return { text: transcript.text, segments };
  }

  /**
   * 处理单个源文件：转码、切分、转录、写出转录文本
   */
  async processFile(sourcePath: string, overrides: ProcessFileOptions = {}): Promise<ProcessFileResult> {
    const options = this.resolveOptions(overrides);
    const ownsWorkDir = !overrides.workDir;
    const workDir = overrides.workDir || join(this.workRoot(), uuidv4());
    const baseName = basename(sourcePath, extname(sourcePath));

    await fs.mkdir(workDir, { recursive: true });
    this.logger.log(`Processing ${sourcePath} in ${workDir}`);

    try {
      // 探测失败时片段按实际切分时长计算偏移
      let segmentSeconds = options.segmentSeconds;
      if (!overrides.bypassSplit) {
        segmentSeconds = await this.segmentSource(sourcePath, workDir, baseName, options, overrides.segmentStrategy);
      }

      const segmentNames = await this.segmentStore.listSegments(workDir);
      const result = await this.transcribeSegments(workDir, segmentNames, { ...options, segmentSeconds });

      const outputDir = this.configService.get<string>('transcription.outputDir') || join(this.workRoot(), 'transcripts');
      await fs.mkdir(outputDir, { recursive: true });
      const transcriptPath = join(outputDir, `${baseName}_transcription.txt`);
      await fs.writeFile(transcriptPath, result.text, 'utf-8');

      this.logger.log(`Transcription for ${sourcePath} written to ${transcriptPath} (segments: ${result.segments.length})`);
      return { ...result, transcriptPath };
    } finally {
      if (ownsWorkDir && !overrides.keepWorkDir) {
        await this.removeWorkDir(workDir);
      }
    }
  }

  private async segmentSource(
    sourcePath: string,
    workDir: string,
    baseName: string,
    options: TranscriptionOptions,
    strategy?: SegmentStrategy,
  ): Promise<number> {
    let mp3Path = sourcePath;
    if (extname(sourcePath).toLowerCase() !== '.mp3') {
      mp3Path = join(workDir, `${baseName}.mp3`);
      await this.ffmpegService.convertToMp3(sourcePath, mp3Path);
    }

    const outPattern = join(workDir, SEGMENT_OUTPUT_PATTERN);
    const resolvedStrategy = strategy || this.configService.get<SegmentStrategy>('transcription.segmentStrategy') || 'time';
    if (resolvedStrategy === 'size') {
      const { segmentSeconds } = await this.ffmpegService.splitBySize(
        mp3Path,
        outPattern,
        options.maxPayloadSize,
        options.segmentSeconds,
      );
      return segmentSeconds;
    }

    await this.ffmpegService.splitByTime(mp3Path, outPattern, options.segmentSeconds);
    return options.segmentSeconds;
  }

  private workRoot(): string {
    return this.configService.get<string>('transcription.workRoot') || defaultWorkRoot();
  }

  private async removeWorkDir(workDir: string): Promise<void> {
    try {
      await fs.rm(workDir, { recursive: true, force: true });
    } catch (err) {
      this.logger.warn(`Failed to cleanup ${workDir}: ${err}`);
    }
  }
}
