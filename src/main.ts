import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { ValidationPipe, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { ResponseInterceptor } from './common/interceptors/response.interceptor';

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  const appModule = AppModule.forRoot();
  // HTTP 接口只负责入队和查询，没有队列时无法工作
  if (!AppModule.isQueueEnabled()) {
    logger.error('REDIS_ENABLED is not true; the HTTP API needs the job queue (use the CLI for local runs)');
    process.exit(1);
  }

  const app = await NestFactory.create<NestFastifyApplication>(appModule, new FastifyAdapter({ logger: true }));

  const configService = app.get(ConfigService);
  const port = configService.get<number>('port') || 3000;

  // 全局前缀
  app.setGlobalPrefix('api');

  // 全局管道
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidNonWhitelisted: true,
    }),
  );

  // 全局过滤器
  app.useGlobalFilters(new HttpExceptionFilter());

  // 全局拦截器
  app.useGlobalInterceptors(new ResponseInterceptor());

  await app.listen(port, '0.0.0.0');
  logger.log(`Application is running on: http://localhost:${port}/api`);
}

bootstrap().catch((err) => {
  new Logger('Bootstrap').error(`Failed to start: ${err}`);
  process.exit(1);
});
