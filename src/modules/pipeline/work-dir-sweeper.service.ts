import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { readdir, rm, stat } from 'fs/promises';
import { join } from 'path';
import { PIPELINE_CONFIG, PipelineConfig } from '../../common/config/pipeline.config';
import { errorMessage } from '../../common/errors/pipeline.errors';

/**
 * 工作目录清理服务
 * 进程崩溃时 ArtifactScope 来不及释放，遗留的任务目录由这里定期删除
 */
@Injectable()
export class WorkDirSweeperService implements OnModuleInit {
  private readonly logger = new Logger(WorkDirSweeperService.name);

  constructor(@Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig) {}

  /**
   * 应用启动时执行一次清理
   */
  async onModuleInit() {
    this.logger.log('Running initial stale work directory cleanup...');
    await this.sweep();
  }

  @Cron(CronExpression.EVERY_HOUR)
  async handleCron() {
    await this.sweep();
  }

  /**
   * 删除修改时间早于 staleWorkDirMs 的任务目录，返回删除数量
   */
  async sweep(now = Date.now()): Promise<number> {
    let entries: string[];
    try {
      entries = await readdir(this.config.tempDir);
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        this.logger.debug(`Work directory root ${this.config.tempDir} does not exist yet`);
        return 0;
      }
      this.logger.error(`Failed to list ${this.config.tempDir}: ${errorMessage(err)}`);
      return 0;
    }

    const threshold = now - this.config.staleWorkDirMs;
    const removed: string[] = [];

    for (const entry of entries) {
      const path = join(this.config.tempDir, entry);
      try {
        const info = await stat(path);
        if (!info.isDirectory() || info.mtimeMs >= threshold) continue;
        await rm(path, { recursive: true, force: true });
        removed.push(entry);
      } catch (err) {
        this.logger.warn(`Failed to remove stale work directory ${path}: ${errorMessage(err)}`);
      }
    }

    if (removed.length === 0) {
      this.logger.debug('No stale work directories found');
    } else {
      this.logger.log(`Removed ${removed.length} stale work directories: ${removed.join(', ')}`);
    }
    return removed.length;
  }
}
