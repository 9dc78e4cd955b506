export const PAYLOAD_ERROR_PATTERN = /Payload length is (\d+), exceeding max payload length of (\d+)/;

// 方向标记、零宽字符、嵌入/覆盖/隔离控制符、BOM
const INVISIBLE_CHARS = /[\u061C\u200B-\u200F\u202A-\u202E\u2066-\u2069\uFEFF]/g;

export const PLACEHOLDER_PREFIX = '[Transcription failed';

export function cleanInvisibleCharacters(text: string): string {
  return text.replace(INVISIBLE_CHARS, '');
}

// 整秒取整，恰好 .5 时取偶数（22.5 -> 22，23.5 -> 24）
function roundHalfEven(value: number): number {
  const rounded = Math.round(value);
  return Math.abs(value % 1) === 0.5 && rounded % 2 !== 0 ? rounded - 1 : rounded;
}

/**
 * 秒数格式化为 HH:MM:SS（按银行家舍入到整秒，小时不按天回绕）
 */
export function formatTimestamp(seconds: number): string {
  const total = Math.max(0, roundHalfEven(seconds));
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  return [h, m, s].map((n) => String(n).padStart(2, '0')).join(':');
}

export function buildPlaceholder(startOffset: number, endOffset: number, reason?: string | null): string {
  return `${PLACEHOLDER_PREFIX} - ${formatTimestamp(startOffset)} - ${formatTimestamp(endOffset)} Reason: ${reason || 'unknown'}]`;
}

export function isPayloadSizeError(message: string): boolean {
  return PAYLOAD_ERROR_PATTERN.test(message);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
