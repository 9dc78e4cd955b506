import { Module } from '@nestjs/common';
import { SegmentStoreService } from './segment-store.service';
import { SegmentTranscriberService } from './segment-transcriber.service';
import { RecursiveSplitterService } from './recursive-splitter.service';
import { ConcurrencySchedulerService } from './concurrency-scheduler.service';
import { TranscriptionPipelineService } from './transcription-pipeline.service';
import { WorkDirCleanupService } from './work-dir-cleanup.service';

@Module({
  providers: [
    SegmentStoreService,
    SegmentTranscriberService,
    RecursiveSplitterService,
    ConcurrencySchedulerService,
    TranscriptionPipelineService,
    WorkDirCleanupService,
  ],
  exports: [TranscriptionPipelineService],
})
export class TranscriptionModule {}
