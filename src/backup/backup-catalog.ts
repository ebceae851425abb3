import { promises as fs } from 'node:fs';
import path from 'node:path';
import { Logger } from '@nestjs/common';

import { isSystemError } from '../common/errors.js';
import { repositoryRef, type RepositoryRef, sameRepository } from '../common/repository-ref.js';
import { ENTITY_CLASSES, type SnapshotId, type SnapshotManifest } from './backup.types.js';
import { MANIFEST_FILE, readManifest } from './manifest.js';
import { type PathResolver, TIMESTAMP_PATTERN } from './path-resolver.js';
import { compareTimestamps, snapshotLabel } from './snapshot-id.js';

export interface RepositorySummary {
  repository: RepositoryRef;
  snapshotCount: number;
  latest: string | null; // newest valid timestamp
}

interface CacheEntry {
  mtimeMs: number;
  manifest: SnapshotManifest | null;
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.stat(file);
    return true;
  } catch {
    return false;
  }
}

async function subdirectories(dir: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries.filter((e) => e.isDirectory()).map((e) => e.name);
  } catch (error: unknown) {
    if (isSystemError(error, 'ENOENT')) return [];
    throw error;
  }
}

/**
 * Read-only view of the snapshots under the backup root. A snapshot is listed
 * only when its manifest is committed and the files it vouches for exist.
 * Invalid directories are left in place.
 */
export class BackupCatalog {
  private readonly logger = new Logger(BackupCatalog.name);
  private readonly cache = new Map<string, CacheEntry>();

  constructor(private readonly paths: PathResolver) {}

  /** Valid manifests, newest first. */
  async list(ref: RepositoryRef): Promise<SnapshotManifest[]> {
    const timestamps = await this.timestamps(ref);
    const manifests: SnapshotManifest[] = [];
    for (const timestamp of timestamps) {
      const manifest = await this.validate({ repository: ref, timestamp });
      if (manifest) manifests.push(manifest);
    }
    return manifests.sort((a, b) => compareTimestamps(b.snapshotId.timestamp, a.snapshotId.timestamp));
  }

  async get(id: SnapshotId): Promise<SnapshotManifest | null> {
    this.paths.snapshotDir(id);
    return this.validate(id);
  }

  /** Snapshot directories without a valid manifest, newest first. */
  async listIncomplete(ref: RepositoryRef): Promise<string[]> {
    const incomplete: string[] = [];
    for (const timestamp of await this.timestamps(ref)) {
      if (!(await this.validate({ repository: ref, timestamp }))) incomplete.push(timestamp);
    }
    return incomplete.sort((a, b) => compareTimestamps(b, a));
  }

  async listRepositories(): Promise<RepositorySummary[]> {
    const summaries: RepositorySummary[] = [];
    for (const owner of await subdirectories(this.paths.backupRoot)) {
      for (const name of await subdirectories(path.join(this.paths.backupRoot, owner))) {
        let ref: RepositoryRef;
        try {
          ref = repositoryRef(owner, name);
          this.paths.repositoryDir(ref);
        } catch {
          continue; // not a directory this tool could have written
        }
        const manifests = await this.list(ref);
        summaries.push({
          repository: ref,
          snapshotCount: manifests.length,
          latest: manifests[0]?.snapshotId.timestamp ?? null,
        });
      }
    }
    return summaries.sort((a, b) =>
      `${a.repository.owner}/${a.repository.name}`.localeCompare(`${b.repository.owner}/${b.repository.name}`),
    );
  }

  /** Bytes on disk for one snapshot directory. */
  async sizeOf(id: SnapshotId): Promise<number> {
    const dir = this.paths.snapshotDir(id);
    return (await exists(dir)) ? directorySize(dir) : 0;
  }

  private async timestamps(ref: RepositoryRef): Promise<string[]> {
    const names = await subdirectories(this.paths.repositoryDir(ref));
    return names.filter((n) => TIMESTAMP_PATTERN.test(n));
  }

  private async validate(id: SnapshotId): Promise<SnapshotManifest | null> {
    const layout = this.paths.layout(id);
    let mtimeMs: number;
    try {
      mtimeMs = (await fs.stat(path.join(layout.root, MANIFEST_FILE))).mtimeMs;
    } catch {
      this.cache.delete(layout.root);
      return null;
    }

    let cached = this.cache.get(layout.root);
    if (!cached || cached.mtimeMs !== mtimeMs) {
      cached = { mtimeMs, manifest: await this.readOwnManifest(id) };
      this.cache.set(layout.root, cached);
    }
    // artifacts can vanish without touching the manifest
    if (!cached.manifest || !(await this.artifactsPresent(id, cached.manifest))) return null;
    return cached.manifest;
  }

  private async readOwnManifest(id: SnapshotId): Promise<SnapshotManifest | null> {
    const layout = this.paths.layout(id);
    const manifest = await readManifest(layout.root);
    if (!manifest) {
      this.logger.debug(`Excluding ${snapshotLabel(id)}: no committed manifest`);
      return null;
    }
    if (!sameRepository(manifest.snapshotId.repository, id.repository) || manifest.snapshotId.timestamp !== id.timestamp) {
      this.logger.warn(`⚠️ Excluding ${snapshotLabel(id)}: manifest names ${snapshotLabel(manifest.snapshotId)}`);
      return null;
    }
    return manifest;
  }

  private async artifactsPresent(id: SnapshotId, manifest: SnapshotManifest): Promise<boolean> {
    const layout = this.paths.layout(id);
    if (manifest.contentState === 'Complete' && !(await exists(path.join(layout.content, 'HEAD')))) {
      this.logger.warn(`⚠️ Excluding ${snapshotLabel(id)}: content mirror missing`);
      return false;
    }
    for (const entityClass of ENTITY_CLASSES) {
      if (manifest.metadataState[entityClass] === 'Complete' && !(await exists(layout.metadata[entityClass]))) {
        this.logger.warn(`⚠️ Excluding ${snapshotLabel(id)}: ${entityClass} metadata missing`);
        return false;
      }
    }
    return true;
  }
}

async function directorySize(dir: string): Promise<number> {
  let total = 0;
  for (const entry of await fs.readdir(dir, { withFileTypes: true })) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) total += await directorySize(full);
    else if (entry.isFile()) total += (await fs.stat(full)).size;
  }
  return total;
}
