import { Inject, Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { BackupService } from '../backup/backup.service.js';
import type { BatchResult } from '../backup/snapshot-coordinator.js';
import { errorMessage } from '../common/errors.js';
import { APP_CONFIG, type AppConfig } from '../config/app-config.js';

@Injectable()
export class SchedulerService {
  private readonly logger = new Logger(SchedulerService.name);
  private running = false;

  constructor(
    @Inject(BackupService) private readonly backups: BackupService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  // Run every day at 2 AM
  @Cron(CronExpression.EVERY_DAY_AT_2AM)
  async handleDailyBackup(): Promise<BatchResult | null> {
    const owner = this.config.backup.scheduleOwner;
    if (!owner) return null;

    if (this.running) {
      this.logger.warn('Previous scheduled backup still running, skipping this run');
      return null;
    }

    this.running = true;
    this.logger.log(`Starting daily backup of ${owner}...`);
    try {
      const result = await this.backups.backupAll(owner);
      this.logger.log(
        `Daily backup completed: ${result.counts.committed} committed, ${result.counts.partial} partial, ${result.counts.aborted} aborted`,
      );
      return result;
    } catch (error: unknown) {
      this.logger.error(`Daily backup of ${owner} failed: ${errorMessage(error)}`);
      return null;
    } finally {
      this.running = false;
    }
  }
}
