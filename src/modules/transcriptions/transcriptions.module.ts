import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { TranscriptionsController } from './transcriptions.controller';
import { TranscriptionsService } from './transcriptions.service';
import { TranscriptionsProcessor } from './transcriptions.processor';
import { TranscriptionModule } from '../transcription/transcription.module';
import { TRANSCRIPTIONS_QUEUE } from './constants';

@Module({
  imports: [
    BullModule.registerQueue({
      name: TRANSCRIPTIONS_QUEUE,
    }),
    TranscriptionModule,
  ],
  controllers: [TranscriptionsController],
  providers: [TranscriptionsService, TranscriptionsProcessor],
  exports: [TranscriptionsService],
})
export class TranscriptionsModule {}
