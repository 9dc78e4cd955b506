import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { spawn } from 'child_process';
import { promises as fs } from 'fs';
import { dirname, join } from 'path';

export interface SizeSplitResult {
  copied: boolean; // 源文件未超限，直接复制为 seg000.mp3
  segmentSeconds: number;
}

// 按体积切分时保留的余量
const SIZE_SAFETY_RATIO = 0.9;
const MIN_SEGMENT_SECONDS = 30;
const PROCESS_TIMEOUT_MS = 10 * 60 * 1000;

/**
 * 根据码率计算满足体积上限的切分时长
 */
export function segmentSecondsForSize(
  maxSegmentSize: number,
  bitrateBits: number,
  fallbackSeconds: number,
): number {
  if (!bitrateBits || bitrateBits <= 0) {
    return fallbackSeconds;
  }
  const target = Math.floor((maxSegmentSize * SIZE_SAFETY_RATIO) / (bitrateBits / 8));
  return Math.min(fallbackSeconds, Math.max(MIN_SEGMENT_SECONDS, target));
}

@Injectable()
export class FfmpegService {
  private readonly logger = new Logger(FfmpegService.name);
  private readonly ffmpegPath: string;
  private readonly ffprobePath: string;

  constructor(private configService: ConfigService) {
    this.ffmpegPath = this.configService.get<string>('ffmpeg.ffmpegPath') || 'ffmpeg';
    this.ffprobePath = this.configService.get<string>('ffmpeg.ffprobePath') || 'ffprobe';
  }

  /**
   * 获取音频时长（秒），失败返回 0
   */
  async probeDuration(path: string): Promise<number> {
    return this.probeFormatField(path, 'duration');
  }

  /**
   * 获取音频码率（bit/s），失败返回 0
   */
  async probeBitrate(path: string): Promise<number> {
    return this.probeFormatField(path, 'bit_rate');
  }

  /**
   * 截取 [start, start + duration) 区间生成新文件（不转码）
   */
  async encodeSlice(src: string, dst: string, start: number, duration: number): Promise<void> {
    await this.run(this.ffmpegPath, [
      '-y',
      '-ss', start.toFixed(3),
      '-t', duration.toFixed(3),
      '-i', src,
      '-vn',
      '-acodec', 'copy',
      dst,
    ]);
  }

  /**
   * 转码为 mp3
   */
  async convertToMp3(src: string, dst: string): Promise<void> {
    this.logger.log(`Converting ${src} to mp3`);
    await this.run(this.ffmpegPath, ['-y', '-i', src, '-vn', '-acodec', 'libmp3lame', '-q:a', '2', dst]);
  }

  /**
   * 按固定时长切分，outPattern 形如 /work/seg%03d.mp3
   */
  async splitByTime(src: string, outPattern: string, segmentSeconds: number): Promise<void> {
    this.logger.log(`Splitting ${src} into ${segmentSeconds}s segments`);
    await this.run(this.ffmpegPath, [
      '-y',
      '-i', src,
      '-f', 'segment',
      '-segment_time', String(segmentSeconds),
      '-c', 'copy',
      outPattern,
    ]);
  }

  /**
   * 按体积上限切分：未超限直接复制为第一段，否则由码率推算切分时长
   */
  async splitBySize(
    src: string,
    outPattern: string,
    maxSegmentSize: number,
    fallbackSeconds: number,
  ): Promise<SizeSplitResult> {
    const { size } = await fs.stat(src);
    if (size <= maxSegmentSize) {
      const dst = join(dirname(outPattern), 'seg000.mp3');
      await fs.copyFile(src, dst);
      this.logger.log(`Source ${src} is ${size} bytes, copied as single segment`);
      return { copied: true, segmentSeconds: fallbackSeconds };
    }

    const bitrate = await this.probeBitrate(src);
    const segmentSeconds = segmentSecondsForSize(maxSegmentSize, bitrate, fallbackSeconds);
    this.logger.log(`Source ${src} is ${size} bytes at ${bitrate} bit/s, segment_time=${segmentSeconds}`);
    await this.splitByTime(src, outPattern, segmentSeconds);
    return { copied: false, segmentSeconds };
  }

  private async probeFormatField(path: string, field: string): Promise<number> {
    try {
      const { stdout } = await this.run(this.ffprobePath, [
        '-v', 'error',
        '-show_entries', `format=${field}`,
        '-of', 'default=noprint_wrappers=1:nokey=1',
        path,
      ]);
      const value = parseFloat(stdout.trim());
      return Number.isFinite(value) && value > 0 ? value : 0;
    } catch (err) {
      this.logger.warn(`ffprobe ${field} failed for ${path}: ${err}`);
      return 0;
    }
  }

  /**
   * 运行外部命令，非零退出码视为失败
   */
  private run(bin: string, args: string[]): Promise<{ stdout: string }> {
    return new Promise((resolve, reject) => {
      const proc = spawn(bin, args);

      let stdout = '';
      let stderr = '';

      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      // 超时处理（10分钟）
      const timer = setTimeout(() => {
        proc.kill('SIGTERM');
        reject(new Error(`${bin} timeout`));
      }, PROCESS_TIMEOUT_MS);

      proc.on('close', (code) => {
        clearTimeout(timer);
        if (code === 0) {
          resolve({ stdout });
        } else {
          reject(new Error(`${bin} exited with code ${code}: ${stderr.trim()}`));
        }
      });

      proc.on('error', (err) => {
        clearTimeout(timer);
        reject(new Error(`Failed to spawn ${bin}: ${err.message}`));
      });
    });
  }
}
