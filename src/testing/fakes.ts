import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { setTimeout as sleep } from 'timers/promises';
import { FfmpegService } from '../providers/ffmpeg/ffmpeg.service';
import { ConcurrencySchedulerService } from '../modules/transcription/concurrency-scheduler.service';
import { RecursiveSplitterService } from '../modules/transcription/recursive-splitter.service';
import { SegmentStoreService } from '../modules/transcription/segment-store.service';
import { SegmentTranscriberService } from '../modules/transcription/segment-transcriber.service';
import { TranscriptionPipelineService } from '../modules/transcription/transcription-pipeline.service';
import { REMOTE_TRANSCRIBER, RemoteTranscriber } from '../modules/transcription/transcription.types';

export type RemoteScript = (path: string) => string[] | Error;

/**
 * 进程内的远端转录替身，记录调用次数与并发峰值
 */
export class FakeRemoteTranscriber implements RemoteTranscriber {
  readonly calls: string[] = [];
  inFlight = 0;
  peakInFlight = 0;

  constructor(
    private readonly script: RemoteScript,
    private readonly delayMs: (path: string) => number = () => 0,
  ) {}

  async *transcribe(path: string): AsyncGenerator<string> {
    this.calls.push(path);
    this.inFlight++;
    this.peakInFlight = Math.max(this.peakInFlight, this.inFlight);
    try {
      const delay = this.delayMs(path);
      if (delay > 0) {
        await sleep(delay);
      }
      const outcome = this.script(path);
      if (outcome instanceof Error) {
        throw outcome;
      }
      for (const chunk of outcome) {
        yield chunk;
      }
    } finally {
      this.inFlight--;
    }
  }
}

export type FakeFfmpeg = {
  probeDuration: jest.Mock<Promise<number>, [string]>;
  probeBitrate: jest.Mock<Promise<number>, [string]>;
  encodeSlice: jest.Mock<Promise<void>, [string, string, number, number]>;
  convertToMp3: jest.Mock<Promise<void>, [string, string]>;
  splitByTime: jest.Mock<Promise<void>, [string, string, number]>;
  splitBySize: jest.Mock<Promise<{ copied: boolean; segmentSeconds: number }>, [string, string, number, number]>;
};

/**
 * ffmpeg 替身：切片时写入源文件一半大小的文件
 */
export function createFakeFfmpeg(durationSeconds = 30): FakeFfmpeg {
  return {
    probeDuration: jest.fn<Promise<number>, [string]>(async () => durationSeconds),
    probeBitrate: jest.fn<Promise<number>, [string]>(async () => 0),
    encodeSlice: jest.fn<Promise<void>, [string, string, number, number]>(async (src, dst) => {
      const { size } = await fs.stat(src);
      await fs.writeFile(dst, Buffer.alloc(Math.max(1, Math.floor(size / 2))));
    }),
    convertToMp3: jest.fn<Promise<void>, [string, string]>(async (_src, dst) => {
      await fs.writeFile(dst, Buffer.alloc(16));
    }),
    splitByTime: jest.fn<Promise<void>, [string, string, number]>(async () => undefined),
    splitBySize: jest.fn<Promise<{ copied: boolean; segmentSeconds: number }>, [string, string, number, number]>(
      async () => ({ copied: true, segmentSeconds: durationSeconds }),
    ),
  };
}

export async function makeTempDir(prefix = 'transcribe-test-'): Promise<string> {
  return fs.mkdtemp(join(tmpdir(), prefix));
}

export async function writeSizedFile(path: string, size: number): Promise<void> {
  await fs.writeFile(path, Buffer.alloc(size));
}

export interface TranscriptionTestingOptions {
  remote: RemoteTranscriber;
  ffmpeg: FakeFfmpeg;
  config?: Record<string, unknown>;
}

/**
 * 组装转录核心服务，远端与 ffmpeg 使用替身
 */
export async function createTranscriptionTestingModule(options: TranscriptionTestingOptions): Promise<TestingModule> {
  Logger.overrideLogger(false);

  return Test.createTestingModule({
    providers: [
      SegmentStoreService,
      SegmentTranscriberService,
      RecursiveSplitterService,
      ConcurrencySchedulerService,
      TranscriptionPipelineService,
      { provide: REMOTE_TRANSCRIBER, useValue: options.remote },
      { provide: FfmpegService, useValue: options.ffmpeg },
      {
        provide: ConfigService,
        useValue: new ConfigService(options.config ?? { transcription: { retryBackoffMs: 0 } }),
      },
    ],
  }).compile();
}
