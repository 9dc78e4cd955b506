export const TRANSCRIPTIONS_QUEUE = 'transcriptions';
