#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';

import { BackupService } from '../backup/backup.service.js';
import { REPOSITORY_PROVIDER, type RepositoryProvider } from '../github/repository-provider.interface.js';
import { runCli } from './backup-cli.js';
import { CliModule } from './cli.module.js';
import { EXIT_CODES } from './exit-codes.js';

async function main() {
  const app = await NestFactory.createApplicationContext(CliModule, {
    logger: ['error', 'warn'], // keep progress lines out of command output
  });

  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.error('Cancelling: running repositories finish their current step, queued ones are skipped');
    controller.abort();
  });

  try {
    process.exitCode = await runCli(process.argv, {
      service: app.get(BackupService),
      provider: app.get<RepositoryProvider>(REPOSITORY_PROVIDER),
      out: (text) => console.log(text),
      err: (text) => console.error(text),
      signal: controller.signal,
    });
  } finally {
    await app.close();
  }
}

main().catch((err: unknown) => {
  console.error('repo-vault failed to start:', err);
  process.exitCode = EXIT_CODES.INVALID_INPUT;
});
