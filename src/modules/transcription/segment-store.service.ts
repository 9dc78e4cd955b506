import { Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import { join } from 'path';
import { FfmpegService } from '../../providers/ffmpeg/ffmpeg.service';
import { SegmentJob } from './transcription.types';

export const SEGMENT_FILE_PATTERN = /^seg\d{3}\.mp3$/;
export const SEGMENT_OUTPUT_PATTERN = 'seg%03d.mp3';

@Injectable()
export class SegmentStoreService {
  private readonly logger = new Logger(SegmentStoreService.name);

  constructor(private ffmpegService: FfmpegService) {}

  /**
   * 列出工作目录中的顶层片段文件（按文件名排序）
   */
  async listSegments(workDir: string): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(workDir);
    } catch (err) {
      this.logger.warn(`Cannot read work dir ${workDir}: ${err}`);
      return [];
    }
    return entries.filter((name) => SEGMENT_FILE_PATTERN.test(name)).sort();
  }

  /**
   * 依次累加时长，预先计算每个顶层片段在原文件中的区间
   * 探测失败的片段按 fallbackSeconds 计
   */
  async buildJobs(workDir: string, names: string[], fallbackSeconds: number): Promise<SegmentJob[]> {
    const sorted = [...names].sort();
    const jobs: SegmentJob[] = [];
    let cursor = 0;

    for (const [index, name] of sorted.entries()) {
      const path = join(workDir, name);
      const duration = (await this.ffmpegService.probeDuration(path)) || fallbackSeconds;
      jobs.push({ path, startOffset: cursor, endOffset: cursor + duration, depth: 0, index });
      cursor += duration;
    }

    return jobs;
  }
}
