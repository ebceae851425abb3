import { Module } from '@nestjs/common';
import { BackupModule } from '../backup/backup.module.js';
import { ConfigModule } from '../config/config.module.js';
import { GithubModule } from '../github/github.module.js';

// Same engine as the HTTP app, without the scheduler
@Module({
  imports: [ConfigModule, GithubModule, BackupModule],
})
export class CliModule {}
