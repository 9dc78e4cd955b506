import { Injectable, OnModuleInit, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import { RemoteTranscriber } from '../../modules/transcription/transcription.types';

/**
 * Deepgram 转录参数
 * @see https://developers.deepgram.com/docs/features
 */
export interface DeepgramTranscriptionOptions {
  /** 模型名称，默认 nova-3 */
  model?: string;
  /** 指定音频语言（BCP-47 格式），如 he, en；未指定时自动检测 */
  language?: string;
  /** 识别说话人变化，为每个词分配 speaker ID，默认 true */
  diarize?: boolean;
  /** 将语音分割成语义单元，返回 utterances 数组（含时间戳、说话人），默认 true */
  utterances?: boolean;
}

// Deepgram utterance（按语义分段的结果）
export interface DeepgramUtterance {
  start: number;
  end: number;
  confidence: number;
  channel: number;
  transcript: string;
  speaker?: number;
}

export interface DeepgramResult {
  duration: number;
  channels: Array<{
    alternatives: Array<{
      transcript: string;
      confidence: number;
    }>;
  }>;
  utterances: DeepgramUtterance[];
}

interface DeepgramListenResponse {
  metadata?: { duration?: number };
  results?: {
    channels?: DeepgramResult['channels'];
    utterances?: DeepgramUtterance[];
  };
}

function isListenResponse(value: unknown): value is DeepgramListenResponse {
  return typeof value === 'object' && value !== null;
}

@Injectable()
export class DeepgramService implements RemoteTranscriber, OnModuleInit {
  private readonly logger = new Logger(DeepgramService.name);
  private apiKey = '';
  private readonly baseUrl = 'https://api.deepgram.com/v1';

  constructor(private configService: ConfigService) {}

  onModuleInit() {
    this.apiKey = this.configService.get<string>('deepgram.apiKey') || '';
    if (!this.apiKey) {
      this.logger.warn('Deepgram API key not configured');
    } else {
      this.logger.log('Deepgram service initialized');
    }
  }

  /**
   * 转录本地音频文件，按 utterance 逐块产出文本
   */
  async *transcribe(path: string, options: { diarize: boolean }): AsyncGenerator<string> {
    const result = await this.transcribeFile(path, {
      diarize: options.diarize,
      language: this.configService.get<string>('deepgram.language'),
    });

    if (result.utterances.length > 0) {
      for (const utterance of result.utterances) {
        yield options.diarize && utterance.speaker !== undefined
          ? `Speaker ${utterance.speaker}: ${utterance.transcript}`
          : utterance.transcript;
      }
      return;
    }

    // Fallback: 没有 utterances 时使用整段转录文本
    const transcript = result.channels[0]?.alternatives[0]?.transcript;
    if (transcript) {
      yield transcript;
    }
  }

  /**
   * 同步转录（上传文件内容并等待结果）
   */
  async transcribeFile(path: string, options: DeepgramTranscriptionOptions = {}): Promise<DeepgramResult> {
    if (!this.apiKey) {
      throw new Error('Deepgram API key not configured');
    }

    const params = new URLSearchParams({
      model: options.model || this.configService.get<string>('deepgram.model') || 'nova-3',
      diarize: String(options.diarize ?? true), // 识别说话人
      punctuate: 'true', // 添加标点
      utterances: String(options.utterances ?? true), // 返回语义分段
    });

    if (options.language) {
      params.set('language', options.language);
    } else {
      params.set('detect_language', 'true');
    }

    const audio = await fs.readFile(path);
    const response = await fetch(`${this.baseUrl}/listen?${params.toString()}`, {
      method: 'POST',
      headers: {
        Authorization: `Token ${this.apiKey}`,
        'Content-Type': 'audio/mpeg',
      },
      body: new Blob([new Uint8Array(audio)]),
    });

    if (!response.ok) {
      // 保留原始错误文本，负载过大的信息需要被上层识别
      const error = await response.text();
      throw new Error(`Deepgram API error: ${response.status} - ${error}`);
    }

    const body: unknown = await response.json();
    if (!isListenResponse(body)) {
      throw new Error('Deepgram API error: malformed response');
    }

    const result: DeepgramResult = {
      duration: body.metadata?.duration || 0,
      channels: body.results?.channels || [],
      utterances: body.results?.utterances || [],
    };

    this.logger.log(
      `Deepgram response for ${path}: duration=${result.duration}s, utterances=${result.utterances.length}`,
    );

    return result;
  }
}
