import { Module } from '@nestjs/common';

import { APP_CONFIG, type AppConfig } from '../config/app-config.js';
import { GithubModule } from '../github/github.module.js';
import { REPOSITORY_PROVIDER, type RepositoryProvider } from '../github/repository-provider.interface.js';
import {
  VERSION_CONTROL_WORKSPACE,
  type VersionControlWorkspace,
} from '../workspace/version-control-workspace.interface.js';
import { WorkspaceModule } from '../workspace/workspace.module.js';
import { BackupCatalog } from './backup-catalog.js';
import { BackupService } from './backup.service.js';
import { BackupsController } from './backups.controller.js';
import { BatchesController } from './batches.controller.js';
import { ContentSnapshotter } from './content-snapshotter.js';
import { MetadataSnapshotter } from './metadata-snapshotter.js';
import { PathResolver } from './path-resolver.js';
import { RepositoryLocks } from './repository-locks.js';
import { RestoreEngine } from './restore-engine.js';
import { Retrier } from './retrier.js';
import { SnapshotCoordinator } from './snapshot-coordinator.js';

export const BACKUP_CLOCK = 'BACKUP_CLOCK';

type Clock = () => Date;

@Module({
  imports: [GithubModule, WorkspaceModule],
  controllers: [BackupsController, BatchesController],
  providers: [
    { provide: BACKUP_CLOCK, useValue: (): Date => new Date() },
    {
      provide: PathResolver,
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig) => new PathResolver(config.backupDir),
    },
    {
      provide: Retrier,
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig) => new Retrier(config.backup.retry),
    },
    { provide: RepositoryLocks, useFactory: () => new RepositoryLocks() },
    {
      provide: MetadataSnapshotter,
      inject: [REPOSITORY_PROVIDER, Retrier, APP_CONFIG, BACKUP_CLOCK],
      useFactory: (provider: RepositoryProvider, retrier: Retrier, config: AppConfig, clock: Clock) =>
        new MetadataSnapshotter(
          provider,
          retrier,
          {
            perPage: config.backup.perPage,
            pullRequestDetails: config.backup.pullRequestDetails,
            includeIssueComments: config.backup.includeIssueComments,
          },
          clock,
        ),
    },
    {
      provide: ContentSnapshotter,
      inject: [VERSION_CONTROL_WORKSPACE, Retrier],
      useFactory: (workspace: VersionControlWorkspace, retrier: Retrier) => new ContentSnapshotter(workspace, retrier),
    },
    {
      provide: SnapshotCoordinator,
      inject: [
        REPOSITORY_PROVIDER,
        ContentSnapshotter,
        MetadataSnapshotter,
        PathResolver,
        Retrier,
        RepositoryLocks,
        APP_CONFIG,
        BACKUP_CLOCK,
      ],
      useFactory: (
        provider: RepositoryProvider,
        content: ContentSnapshotter,
        metadata: MetadataSnapshotter,
        paths: PathResolver,
        retrier: Retrier,
        locks: RepositoryLocks,
        config: AppConfig,
        clock: Clock,
      ) =>
        new SnapshotCoordinator(
          provider,
          content,
          metadata,
          paths,
          retrier,
          locks,
          {
            concurrency: config.backup.concurrency,
            pageCap: config.backup.pageCap,
            cloneBaseUrl: config.cloneBaseUrl,
            rateLimitThreshold: config.rateLimitThreshold,
          },
          clock,
        ),
    },
    {
      provide: BackupCatalog,
      inject: [PathResolver],
      useFactory: (paths: PathResolver) => new BackupCatalog(paths),
    },
    {
      provide: RestoreEngine,
      inject: [BackupCatalog, PathResolver, VERSION_CONTROL_WORKSPACE, REPOSITORY_PROVIDER, Retrier, APP_CONFIG],
      useFactory: (
        catalog: BackupCatalog,
        paths: PathResolver,
        workspace: VersionControlWorkspace,
        provider: RepositoryProvider,
        retrier: Retrier,
        config: AppConfig,
      ) =>
        new RestoreEngine(catalog, paths, workspace, provider, retrier, {
          workspaceDir: config.workspaceDir,
          pageCap: config.backup.pageCap,
          perPage: config.backup.perPage,
        }),
    },
    BackupService,
  ],
  exports: [BackupService],
})
export class BackupModule {}
