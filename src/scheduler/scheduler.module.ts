import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { BackupModule } from '../backup/backup.module.js';
import { SchedulerService } from './scheduler.service.js';

@Module({
  imports: [ScheduleModule.forRoot(), BackupModule],
  providers: [SchedulerService],
  exports: [SchedulerService],
})
export class SchedulerModule {}
