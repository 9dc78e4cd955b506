import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { promises as fs } from 'fs';
import { join, resolve } from 'path';

/**
 * 工作目录清理服务
 * 中断的运行不会被续跑，残留的工作目录超过保留时长后删除
 */
@Injectable()
export class WorkDirCleanupService implements OnModuleInit {
  private readonly logger = new Logger(WorkDirCleanupService.name);

  constructor(private configService: ConfigService) {}

  /**
   * 应用启动时执行一次清理
   */
  async onModuleInit() {
    await this.cleanupStaleWorkDirs();
  }

  @Cron(CronExpression.EVERY_HOUR)
  async handleCron() {
    await this.cleanupStaleWorkDirs();
  }

  /**
   * 删除超过 workDirTtlHours 未修改的工作目录，返回删除数量
   */
  async cleanupStaleWorkDirs(now: number = Date.now()): Promise<number> {
    const workRoot = this.configService.get<string>('transcription.workRoot');
    if (!workRoot) {
      return 0;
    }
    const ttlHours = this.configService.get<number>('transcription.workDirTtlHours') ?? 6;
    const outputDir = this.configService.get<string>('transcription.outputDir');
    const threshold = now - ttlHours * 60 * 60 * 1000;

    let entries: string[];
    try {
      entries = await fs.readdir(workRoot);
    } catch {
      this.logger.debug(`Work root ${workRoot} does not exist yet`);
      return 0;
    }

    let removed = 0;
    for (const entry of entries) {
      const dir = join(workRoot, entry);
      if (outputDir && resolve(dir) === resolve(outputDir)) {
        continue;
      }
      try {
        const stat = await fs.stat(dir);
        if (!stat.isDirectory() || stat.mtimeMs >= threshold) {
          continue;
        }
        await fs.rm(dir, { recursive: true, force: true });
        removed++;
      } catch (err) {
        this.logger.warn(`Failed to cleanup ${dir}: ${err}`);
      }
    }

    if (removed > 0) {
      this.logger.log(`Removed ${removed} stale work dirs from ${workRoot}`);
    }
    return removed;
  }
}
