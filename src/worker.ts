import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';

/**
 * Worker 入口
 * 独立进程运行，消费 BullMQ 转录队列
 */
async function bootstrap() {
  const logger = new Logger('Worker');

  const appModule = AppModule.forRoot();
  if (!AppModule.isQueueEnabled()) {
    logger.error('REDIS_ENABLED is not true; nothing to consume');
    process.exit(1);
  }

  // 创建应用上下文（不启动 HTTP 服务）
  const app = await NestFactory.createApplicationContext(appModule);

  logger.log('Worker started and listening for jobs...');

  // 优雅关闭
  const shutdown = (signal: string) => {
    logger.log(`Received ${signal}, shutting down...`);
    app
      .close()
      .then(() => process.exit(0))
      .catch((err) => {
        logger.error(`Shutdown failed: ${err}`);
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

bootstrap().catch((err) => {
  new Logger('Worker').error(`Failed to start: ${err}`);
  process.exit(1);
});
