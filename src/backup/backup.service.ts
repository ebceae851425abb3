import { Inject, Injectable, Logger } from '@nestjs/common';

import { parseRepositoryRef, repositoryRef, type RepositoryRef } from '../common/repository-ref.js';
import type { SnapshotId, SnapshotManifest } from './backup.types.js';
import { BackupCatalog, type RepositorySummary } from './backup-catalog.js';
import { assertTimestamp } from './path-resolver.js';
import { RestoreEngine, type RestoreOptions, type RestoreReport } from './restore-engine.js';
import {
  type BackupOptions,
  type BackupResult,
  type BatchOptions,
  type BatchResult,
  SnapshotCoordinator,
} from './snapshot-coordinator.js';

export interface SnapshotListing {
  repository: string;
  snapshots: SnapshotManifest[];
  incomplete: string[]; // directories without a committed manifest
}

export interface SnapshotDetail {
  manifest: SnapshotManifest;
  sizeBytes: number;
}

export interface RestoreRequest extends Omit<RestoreOptions, 'intoRepository'> {
  target: string;
  intoRepository?: string; // owner/name
}

/** Entry point shared by the HTTP controllers, the scheduler and the CLI. */
@Injectable()
export class BackupService {
  private readonly logger = new Logger(BackupService.name);

  constructor(
    @Inject(SnapshotCoordinator) private readonly coordinator: SnapshotCoordinator,
    @Inject(BackupCatalog) private readonly catalog: BackupCatalog,
    @Inject(RestoreEngine) private readonly restoreEngine: RestoreEngine,
  ) {}

  snapshotId(owner: string, name: string, timestamp: string): SnapshotId {
    assertTimestamp(timestamp);
    return { repository: repositoryRef(owner, name), timestamp };
  }

  async backup(ref: RepositoryRef, options: BackupOptions = {}): Promise<BackupResult> {
    return this.coordinator.backup(ref, options);
  }

  async backupAll(owner?: string, options: BatchOptions = {}): Promise<BatchResult> {
    return this.coordinator.backupAll(owner, options);
  }

  async resume(id: SnapshotId, options: BackupOptions = {}): Promise<BackupResult> {
    return this.coordinator.resume(id, options);
  }

  async listRepositories(): Promise<RepositorySummary[]> {
    return this.catalog.listRepositories();
  }

  async listSnapshots(ref: RepositoryRef): Promise<SnapshotListing> {
    const [snapshots, incomplete] = await Promise.all([
      this.catalog.list(ref),
      this.catalog.listIncomplete(ref),
    ]);
    if (incomplete.length > 0) {
      this.logger.debug(`${incomplete.length} incomplete snapshot dir(s) for ${ref.owner}/${ref.name}`);
    }
    return { repository: `${ref.owner}/${ref.name}`, snapshots, incomplete };
  }

  /** Committed snapshot with its size on disk, or null. */
  async getSnapshot(id: SnapshotId): Promise<SnapshotDetail | null> {
    const manifest = await this.catalog.get(id);
    if (!manifest) return null;
    return { manifest, sizeBytes: await this.catalog.sizeOf(id) };
  }

  async restore(id: SnapshotId, request: RestoreRequest): Promise<RestoreReport> {
    const { target, intoRepository, ...options } = request;
    return this.restoreEngine.restore(id, target, {
      ...options,
      intoRepository: intoRepository ? parseRepositoryRef(intoRepository) : undefined,
    });
  }
}
