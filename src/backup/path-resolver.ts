import path from 'node:path';
import { InvalidIdentifierError } from '../common/errors.js';
import type { RepositoryRef } from '../common/repository-ref.js';
import { type EntityClass, metadataFileName, type SnapshotId } from './backup.types.js';

export const TIMESTAMP_PATTERN = /^\d{8}-\d{6}(-\d+)?$/;

// NUL and other control characters
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

function assertSafeSegment(kind: string, value: string): void {
  if (
    value.length === 0 ||
    value === '.' ||
    value.includes('..') ||
    value.includes('/') ||
    value.includes('\\') ||
    value.includes(':') ||
    CONTROL_CHARS.test(value) ||
    value.trim() !== value
  ) {
    throw new InvalidIdentifierError(`Unsafe repository ${kind}: ${JSON.stringify(value)}`);
  }
}

export function assertTimestamp(timestamp: string): void {
  if (!TIMESTAMP_PATTERN.test(timestamp)) {
    throw new InvalidIdentifierError(`Invalid snapshot timestamp: ${JSON.stringify(timestamp)}`);
  }
}

/** Throws InvalidIdentifierError unless owner and name are safe path segments. */
export function assertSafeRepositoryRef(ref: RepositoryRef): void {
  assertSafeSegment('owner', ref.owner);
  assertSafeSegment('name', ref.name);
}

/**
 * BACKUP_DIR/<owner>/<name>[/<timestamp>]. The result is always a strict
 * descendant of `backupRoot`.
 */
export function resolveBackupPath(backupRoot: string, ref: RepositoryRef, timestamp?: string): string {
  assertSafeRepositoryRef(ref);
  if (timestamp !== undefined) assertTimestamp(timestamp);

  const root = path.resolve(backupRoot);
  const segments = timestamp === undefined ? [ref.owner, ref.name] : [ref.owner, ref.name, timestamp];
  const resolved = path.resolve(root, ...segments);

  const relative = path.relative(root, resolved);
  if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new InvalidIdentifierError(`Path escapes backup root: ${resolved}`);
  }
  return resolved;
}

/** True when `candidate` is `dir` itself or lies somewhere below it. */
export function isSameOrInside(dir: string, candidate: string): boolean {
  const relative = path.relative(path.resolve(dir), path.resolve(candidate));
  return relative === '' || (relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative));
}

export interface SnapshotLayout {
  root: string;
  manifest: string;
  content: string;
  metadataDir: string;
  metadata: Record<EntityClass, string>;
}

/** Injectable view of the on-disk layout under one backup root. */
export class PathResolver {
  readonly backupRoot: string;

  constructor(backupRoot: string) {
    this.backupRoot = path.resolve(backupRoot);
  }

  /** Whether writing to `target` could touch stored snapshots, or the root could sit inside it. */
  overlapsBackupRoot(target: string): boolean {
    return isSameOrInside(this.backupRoot, target) || isSameOrInside(target, this.backupRoot);
  }

  repositoryDir(ref: RepositoryRef): string {
    return resolveBackupPath(this.backupRoot, ref);
  }

  snapshotDir(id: SnapshotId): string {
    return resolveBackupPath(this.backupRoot, id.repository, id.timestamp);
  }

  layout(id: SnapshotId): SnapshotLayout {
    const root = this.snapshotDir(id);
    const metadataDir = path.join(root, 'metadata');
    return {
      root,
      manifest: path.join(root, 'manifest.json'),
      content: path.join(root, 'content'),
      metadataDir,
      metadata: {
        repository: path.join(metadataDir, metadataFileName('repository')),
        issues: path.join(metadataDir, metadataFileName('issues')),
        pull_requests: path.join(metadataDir, metadataFileName('pull_requests')),
        releases: path.join(metadataDir, metadataFileName('releases')),
      },
    };
  }
}
