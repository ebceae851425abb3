// src/app.module.ts
import { Module } from '@nestjs/common';
import { APP_FILTER, APP_GUARD } from '@nestjs/core';

import { AppController } from './app.controller.js';
import { ApiKeyGuard } from './auth/api-key.guard.js';
import { BackupModule } from './backup/backup.module.js';
import { BackupErrorFilter } from './common/backup-error.filter.js';
import { ConfigModule } from './config/config.module.js';
import { GithubModule } from './github/github.module.js';
import { SchedulerModule } from './scheduler/scheduler.module.js';

@Module({
  imports: [ConfigModule, GithubModule, BackupModule, SchedulerModule],
  controllers: [AppController],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ApiKeyGuard,
    },
    {
      provide: APP_FILTER,
      useClass: BackupErrorFilter,
    },
  ],
})
export class AppModule {}
