#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { TranscriptionPipelineService } from './modules/transcription/transcription-pipeline.service';

/**
 * 本地命令行入口：转录单个文件
 * 用法: node dist/cli.js <source-file>
 */
async function main() {
  const logger = new Logger('Cli');
  const sourcePath = process.argv[2];
  if (!sourcePath) {
    logger.error('Usage: transcribe <source-file>');
    process.exitCode = 1;
    return;
  }

  const app = await NestFactory.createApplicationContext(AppModule.forRoot({ queue: false }));
  try {
    const pipeline = app.get(TranscriptionPipelineService);
    const result = await pipeline.processFile(sourcePath);
    logger.log(`Transcribed ${result.segments.length} segments -> ${result.transcriptPath}`);
  } finally {
    await app.close();
  }
}

main().catch((err) => {
  new Logger('Cli').error(`Transcription failed: ${err}`);
  process.exit(1);
});
