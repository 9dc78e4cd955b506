import { BadRequestException, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { getQueueToken } from '@nestjs/bullmq';
import { Test } from '@nestjs/testing';
import { promises as fs } from 'fs';
import { join } from 'path';
import { TranscriptionsService } from './transcriptions.service';
import { TRANSCRIPTIONS_QUEUE } from './constants';
import { TranscriptionJobData, TranscriptionJobResult } from './dto/transcription.dto';
import { ErrorCode } from '../../common/interfaces/response.interface';
import { makeTempDir, writeSizedFile } from '../../testing/fakes';

interface FakeJob {
  data: TranscriptionJobData;
  returnvalue: TranscriptionJobResult | null;
  failedReason?: string;
  timestamp: number;
  getState: () => Promise<string>;
}

function fakeJob(state: string, overrides: Partial<FakeJob> = {}): FakeJob {
  return {
    data: { source_path: '/audio/lecture.mp3', options: {} },
    returnvalue: null,
    timestamp: 0,
    getState: async () => state,
    ...overrides,
  };
}

describe('TranscriptionsService', () => {
  let service: TranscriptionsService;
  let workDir: string;
  const queue = {
    add: jest.fn<Promise<void>, [string, TranscriptionJobData, { jobId: string; attempts: number }]>(),
    getJob: jest.fn<Promise<FakeJob | undefined>, [string]>(),
  };

  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  beforeEach(async () => {
    queue.add.mockReset().mockResolvedValue(undefined);
    queue.getJob.mockReset();
    workDir = await makeTempDir();

    const moduleRef = await Test.createTestingModule({
      providers: [
        TranscriptionsService,
        { provide: getQueueToken(TRANSCRIPTIONS_QUEUE), useValue: queue },
        { provide: ConfigService, useValue: new ConfigService({ transcription: { pollIntervalSeconds: 7 } }) },
      ],
    }).compile();

    service = moduleRef.get(TranscriptionsService);
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  describe('createTranscription', () => {
    it('rejects a missing source file', async () => {
      await expect(
        service.createTranscription({ source_path: join(workDir, 'missing.mp3') }),
      ).rejects.toBeInstanceOf(BadRequestException);
      expect(queue.add).not.toHaveBeenCalled();
    });

    it('queues the job with its options', async () => {
      const source = join(workDir, 'lecture.mp3');
      await writeSizedFile(source, 64);

      const created = await service.createTranscription({
        source_path: source,
        segment_strategy: 'size',
        max_concurrency: 4,
        max_split_depth: 2,
      });

      expect(created.status).toBe('waiting');
      expect(created.retry_after).toBe(7);
      expect(queue.add).toHaveBeenCalledTimes(1);
      const [name, data, opts] = queue.add.mock.calls[0];
      expect(name).toBe('transcribe');
      expect(data).toEqual({
        source_path: source,
        segment_strategy: 'size',
        options: {
          segmentSeconds: undefined,
          maxConcurrency: 4,
          maxRetries: undefined,
          maxPayloadSize: undefined,
          maxSplitDepth: 2,
        },
      });
      expect(opts.jobId).toBe(created.job_id);
      expect(opts.attempts).toBe(2);
    });
  });

  describe('getTranscription', () => {
    it('throws NotFound for an unknown job', async () => {
      queue.getJob.mockResolvedValue(undefined);

      await expect(service.getTranscription('nope')).rejects.toBeInstanceOf(NotFoundException);
    });

    it('returns the result of a completed job', async () => {
      const result: TranscriptionJobResult = {
        text: 'first\n\nsecond',
        segments: [],
        transcriptPath: '/out/lecture_transcription.txt',
      };
      queue.getJob.mockResolvedValue(fakeJob('completed', { returnvalue: result }));

      const response = await service.getTranscription('job-1');

      expect(response).toEqual({
        job_id: 'job-1',
        status: 'completed',
        source_path: '/audio/lecture.mp3',
        result,
        error: null,
        created_at: '1970-01-01T00:00:00.000Z',
      });
    });

    it('reports the failure reason of a failed job', async () => {
      queue.getJob.mockResolvedValue(fakeJob('failed', { failedReason: 'ffmpeg exited with code 1: bad input' }));

      const response = await service.getTranscription('job-2');

      expect(response.result).toBeNull();
      expect(response.error).toEqual({ code: ErrorCode.ENGINE_ERROR, message: 'ffmpeg exited with code 1: bad input' });
      expect(response.retry_after).toBeUndefined();
    });

    it('asks pending callers to poll again', async () => {
      queue.getJob.mockResolvedValue(fakeJob('active'));

      const response = await service.getTranscription('job-3');

      expect(response.status).toBe('active');
      expect(response.result).toBeNull();
      expect(response.error).toBeNull();
      expect(response.retry_after).toBe(7);
    });
  });
});
