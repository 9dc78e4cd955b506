import { tmpdir } from 'os';
import { join } from 'path';

const intFromEnv = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value || '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export const defaultWorkRoot = (): string => join(tmpdir(), 'transcribe_work');

export default () => {
  const workRoot = process.env.WORK_ROOT || defaultWorkRoot();

  return {
    port: intFromEnv(process.env.PORT, 3000),

    redis: {
      url: process.env.REDIS_URL || 'redis://localhost:6379',
    },

    deepgram: {
      apiKey: process.env.DEEPGRAM_API_KEY,
      model: process.env.DEEPGRAM_MODEL || 'nova-3',
      language: process.env.TRANSCRIPTION_LANGUAGE || 'he',
    },

    ffmpeg: {
      ffmpegPath: process.env.FFMPEG_PATH || 'ffmpeg',
      ffprobePath: process.env.FFPROBE_PATH || 'ffprobe',
    },

    // 分段转录配置
    transcription: {
      segmentSeconds: intFromEnv(process.env.SEGMENT_SECONDS, 10 * 60), // 每段时长（秒）
      segmentStrategy: process.env.SEGMENT_STRATEGY === 'size' ? 'size' : 'time',
      maxConcurrency: intFromEnv(process.env.MAX_SEGMENT_CONCURRENCY, 2), // 限制并发，避免远端 worker 耗尽
      maxRetries: intFromEnv(process.env.MAX_SEGMENT_RETRIES, 2),
      maxPayloadSize: intFromEnv(process.env.MAX_SEGMENT_SIZE, 8 * 1024 * 1024),
      maxSplitDepth: intFromEnv(process.env.MAX_SPLIT_DEPTH, 3),
      retryBackoffMs: intFromEnv(process.env.RETRY_BACKOFF_MS, 1000),
      workRoot,
      outputDir: process.env.OUTPUT_DIR || join(workRoot, 'transcripts'),
      workDirTtlHours: intFromEnv(process.env.WORK_DIR_TTL_HOURS, 6),
      pollIntervalSeconds: 5, // 任务状态默认轮询间隔
    },
  };
};
