import { Module, Global } from '@nestjs/common';
import { DeepgramService } from './deepgram.service';
import { REMOTE_TRANSCRIBER } from '../../modules/transcription/transcription.types';

/**
 * 以 Deepgram 作为远端转录能力
 */
@Global()
@Module({
  providers: [DeepgramService, { provide: REMOTE_TRANSCRIBER, useExisting: DeepgramService }],
  exports: [DeepgramService, REMOTE_TRANSCRIBER],
})
export class DeepgramModule {}
