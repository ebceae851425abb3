import { promises as fs } from 'node:fs';
import { errorMessage, isSystemError, WorkspaceError } from '../common/errors.js';
import { qualifiedName, type RepositoryRef } from '../common/repository-ref.js';
import type { SnapshotId } from './backup.types.js';
import type { PathResolver } from './path-resolver.js';

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

/** UTC `YYYYMMDD-HHMMSS`. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `-${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

function splitTimestamp(timestamp: string): { base: string; counter: number } {
  const base = timestamp.slice(0, 15);
  const suffix = timestamp.slice(16);
  return { base, counter: suffix ? Number(suffix) : 0 };
}

/** Ascending order: second-resolution stamp, then the numeric counter. */
export function compareTimestamps(a: string, b: string): number {
  const left = splitTimestamp(a);
  const right = splitTimestamp(b);
  if (left.base !== right.base) return left.base < right.base ? -1 : 1;
  return left.counter - right.counter;
}

export function snapshotLabel(id: SnapshotId): string {
  return `${qualifiedName(id.repository)}@${id.timestamp}`;
}

function isAlreadyExists(error: unknown): boolean {
  return isSystemError(error, 'EEXIST');
}

const MAX_COUNTER = 10_000;

/**
 * Reserve a fresh snapshot directory. The exclusive mkdir is the claim: when
 * the base stamp is taken, `-1`, `-2`, ... are tried in turn.
 */
export async function allocateSnapshotId(
  paths: PathResolver,
  repository: RepositoryRef,
  now: Date,
): Promise<SnapshotId> {
  const base = formatTimestamp(now);
  const repositoryDir = paths.repositoryDir(repository);
  try {
    await fs.mkdir(repositoryDir, { recursive: true });
  } catch (error: unknown) {
    throw new WorkspaceError(`Cannot create backup directory: ${errorMessage(error)}`, { cause: error });
  }

  for (let counter = 0; counter < MAX_COUNTER; counter++) {
    const id: SnapshotId = {
      repository,
      timestamp: counter === 0 ? base : `${base}-${counter}`,
    };
    try {
      await fs.mkdir(paths.snapshotDir(id));
      return id;
    } catch (error: unknown) {
      if (isAlreadyExists(error)) continue;
      throw new WorkspaceError(`Cannot create snapshot directory: ${errorMessage(error)}`, { cause: error });
    }
  }
  throw new WorkspaceError(`No free snapshot id for ${qualifiedName(repository)} at ${base}`);
}
