/**
 * 待转录的音频片段（创建后不再修改）
 */
export interface SegmentJob {
  path: string;
  startOffset: number; // 在原始文件中的起始秒数
  endOffset: number;
  depth: number; // 递归切分深度，顶层片段为 0
  index: number; // 所属顶层片段序号，切分出的子片段沿用父片段的序号
}

/**
 * 叶子结果：转录文本或失败占位符
 */
export interface SegmentTextResult {
  kind: 'text';
  index: number;
  text: string;
  startOffset: number;
  endOffset: number;
}

/**
 * 负载过大信号：需要把该片段对半切分后重新提交
 */
export interface SegmentSplitResult {
  kind: 'split';
  index: number;
  path: string;
  startOffset: number;
  endOffset: number;
  depth: number;
}

export type SegmentResult = SegmentTextResult | SegmentSplitResult;

export interface Transcript {
  text: string;
  leaves: SegmentTextResult[];
}

export type SegmentStrategy = 'time' | 'size';

export interface TranscriptionOptions {
  segmentSeconds: number;
  maxConcurrency: number;
  maxRetries: number;
  maxPayloadSize: number;
  maxSplitDepth: number;
}

export interface TranscribeSegmentsResult {
  text: string;
  segments: string[];
}

/**
 * 远端转录能力：按到达顺序产出文本块
 */
export interface RemoteTranscriber {
  transcribe(path: string, options: { diarize: boolean }): AsyncIterable<string>;
}

export const REMOTE_TRANSCRIBER = Symbol('REMOTE_TRANSCRIBER');
