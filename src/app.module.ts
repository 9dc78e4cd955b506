import { Module, DynamicModule, ModuleMetadata } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { ScheduleModule } from '@nestjs/schedule';
import { ConfigModule, ConfigService } from '@nestjs/config';
import configuration from './common/config/configuration';

// Providers
import { DeepgramModule } from './providers/deepgram/deepgram.module';
import { FfmpegModule } from './providers/ffmpeg/ffmpeg.module';

// Business Modules
import { TranscriptionModule } from './modules/transcription/transcription.module';
import { TranscriptionsModule } from './modules/transcriptions/transcriptions.module';

export interface AppModuleOptions {
  /** 是否加载 BullMQ 队列（默认取 REDIS_ENABLED） */
  queue?: boolean;
}

@Module({})
export class AppModule {
  /**
   * REDIS_ENABLED 可以写在 .env 中，需在 forRoot 加载配置之后读取
   */
  static isQueueEnabled(): boolean {
    return process.env.REDIS_ENABLED === 'true';
  }

  static forRoot(options: AppModuleOptions = {}): DynamicModule {
    // Config
    const configModule = ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      envFilePath: ['.env.local', '.env'],
    });
    const queueEnabled = options.queue ?? AppModule.isQueueEnabled();

    const imports: NonNullable<ModuleMetadata['imports']> = [
      configModule,

      // Schedule (定时清理工作目录)
      ScheduleModule.forRoot(),

      // Providers
      DeepgramModule,
      FfmpegModule,

      // Business Modules
      TranscriptionModule,
    ];

    // 只有启用 Redis 时才加载队列、Worker 与 HTTP 接口
    if (queueEnabled) {
      imports.push(
        BullModule.forRootAsync({
          imports: [ConfigModule],
          useFactory: (configService: ConfigService) => ({
            connection: {
              url: configService.get<string>('redis.url'),
            },
          }),
          inject: [ConfigService],
        }),
        TranscriptionsModule,
      );
    }

    return {
      module: AppModule,
      imports,
    };
  }
}
