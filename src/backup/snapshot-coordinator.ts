import { promises as fs } from 'node:fs';
import { Logger } from '@nestjs/common';

import {
  AbortedError,
  BackupError,
  type ErrorSummary,
  errorMessage,
  isBackupError,
  SnapshotCommittedError,
  SnapshotNotFoundError,
  toErrorSummary,
} from '../common/errors.js';
import { qualifiedName, repositoryRef, type RepositoryRef } from '../common/repository-ref.js';
import type { RepoDescriptor, RepositoryProvider } from '../github/repository-provider.interface.js';
import {
  type ContentState,
  ENTITY_CLASSES,
  type EntityClass,
  isPartialSnapshot,
  type ManifestError,
  type MetadataArtifact,
  type MetadataState,
  type SnapshotId,
  type SnapshotManifest,
  type SnapshotState,
} from './backup.types.js';
import type { ContentSnapshotter } from './content-snapshotter.js';
import { readManifest, writeJsonAtomic } from './manifest.js';
import type { MetadataSnapshotter } from './metadata-snapshotter.js';
import type { PathResolver, SnapshotLayout } from './path-resolver.js';
import type { RepositoryLocks } from './repository-locks.js';
import type { Retrier } from './retrier.js';
import { allocateSnapshotId, snapshotLabel } from './snapshot-id.js';
import { runWithConcurrency } from './worker-pool.js';

export const SNAPSHOT_TRANSITIONS: Readonly<Record<SnapshotState, readonly SnapshotState[]>> = {
  Created: ['ContentInFlight', 'Aborted'],
  ContentInFlight: ['MetadataInFlight', 'Aborted'],
  MetadataInFlight: ['Finalizing', 'Aborted'],
  Finalizing: ['Committed', 'Aborted'],
  Committed: [],
  Aborted: [],
};

export function canTransition(from: SnapshotState, to: SnapshotState): boolean {
  return SNAPSHOT_TRANSITIONS[from].includes(to);
}

export interface TransitionEvent {
  snapshotId: SnapshotId;
  from: SnapshotState;
  to: SnapshotState;
}

export interface BackupOptions {
  includeMetadata?: boolean; // default true
  entityClasses?: EntityClass[]; // default: all
  signal?: AbortSignal;
  onTransition?: (event: TransitionEvent) => void;
}

export type BackupStatus = 'committed' | 'partial' | 'aborted';

export interface BackupResult {
  status: BackupStatus;
  snapshotId: SnapshotId;
  state: 'Committed' | 'Aborted';
  transitions: SnapshotState[];
  manifest: SnapshotManifest | null;
  error: ErrorSummary | null; // why the run aborted
}

export type BatchStatus = BackupStatus | 'skipped' | 'rejected';

export interface BatchEntry {
  repository: string;
  status: BatchStatus;
  timestamp: string | null;
  error: ErrorSummary | null;
}

export interface BatchResult {
  owner: string | null;
  startedAt: string;
  completedAt: string;
  results: Record<string, BatchEntry>; // keyed by owner/name
  counts: Record<BatchStatus, number>;
}

export interface BatchOptions {
  signal?: AbortSignal;
  includeMetadata?: boolean;
  onResult?: (entry: BatchEntry) => void;
}

export interface CoordinatorSettings {
  concurrency: number;
  pageCap: number;
  cloneBaseUrl: string;
  rateLimitThreshold: number;
}

class SnapshotRun {
  state: SnapshotState = 'Created';
  readonly transitions: SnapshotState[] = ['Created'];

  constructor(
    readonly id: SnapshotId,
    private readonly logger: Logger,
    private readonly listener?: (event: TransitionEvent) => void,
  ) {}

  transition(to: SnapshotState): void {
    const from = this.state;
    if (!canTransition(from, to)) {
      throw new Error(`Illegal snapshot transition ${from} -> ${to}`);
    }
    this.state = to;
    this.transitions.push(to);
    this.logger.debug(`🔁 ${snapshotLabel(this.id)}: ${from} -> ${to}`);
    this.listener?.({ snapshotId: this.id, from, to });
  }
}

// Filesystem failure while persisting: the run cannot commit
class CatastrophicError extends Error {
  constructor(readonly original: unknown) {
    super(errorMessage(original), { cause: original });
  }
}

/**
 * Runs the per-repository snapshot state machine and fans it out over many
 * repositories. Content and each metadata class fail independently; only
 * cancellation and filesystem failures abort a run.
 */
export class SnapshotCoordinator {
  private readonly logger = new Logger(SnapshotCoordinator.name);

  constructor(
    private readonly provider: RepositoryProvider,
    private readonly content: ContentSnapshotter,
    private readonly metadata: MetadataSnapshotter,
    private readonly paths: PathResolver,
    private readonly retrier: Retrier,
    private readonly locks: RepositoryLocks,
    private readonly settings: CoordinatorSettings,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  /** Back up one repository into a freshly allocated snapshot. */
  async backup(ref: RepositoryRef, options: BackupOptions = {}): Promise<BackupResult> {
    this.paths.repositoryDir(ref); // rejects hostile identifiers before anything else
    const release = this.locks.acquire(ref);
    try {
      const startedAt = this.clock();
      const id = await allocateSnapshotId(this.paths, ref, startedAt);
      this.logger.log(`🚀 Backing up ${snapshotLabel(id)}`);
      return await this.execute(id, startedAt, options);
    } finally {
      release();
    }
  }

  /**
   * Re-run the pipeline into a snapshot directory left without a valid
   * manifest, e.g. by a crash. Stale artifacts are discarded first.
   */
  async resume(id: SnapshotId, options: BackupOptions = {}): Promise<BackupResult> {
    const layout = this.paths.layout(id);
    if (!(await isDirectory(layout.root))) {
      throw new SnapshotNotFoundError(`No snapshot directory for ${snapshotLabel(id)}`);
    }
    const release = this.locks.acquire(id.repository);
    try {
      if (await readManifest(layout.root)) {
        throw new SnapshotCommittedError(`${snapshotLabel(id)} is already committed`);
      }
      await Promise.all(
        [layout.manifest, layout.content, layout.metadataDir].map((p) =>
          fs.rm(p, { recursive: true, force: true }),
        ),
      );
      this.logger.log(`♻️ Resuming ${snapshotLabel(id)}`);
      return await this.execute(id, this.clock(), options);
    } finally {
      release();
    }
  }

  private async execute(id: SnapshotId, startedAt: Date, options: BackupOptions): Promise<BackupResult> {
    const run = new SnapshotRun(id, this.logger, options.onTransition);
    const layout = this.paths.layout(id);
    const ref = id.repository;
    const errors: ManifestError[] = [];

    try {
      this.checkCancelled(options.signal, id);
      run.transition('ContentInFlight');

      const source = await this.describeSource(ref);
      let contentState: ContentState = 'Failed';
      let refCount: number | null = null;
      try {
        const mirror = await this.content.mirrorClone(ref, source.cloneUrl, layout.content);
        contentState = 'Complete';
        refCount = mirror.refCount;
      } catch (error: unknown) {
        if (!isBackupError(error)) throw new CatastrophicError(error);
        errors.push({ component: 'content', ...toErrorSummary(error) });
      }

      this.checkCancelled(options.signal, id);
      run.transition('MetadataInFlight');

      const requested =
        options.includeMetadata === false ? [] : ENTITY_CLASSES.filter((c) => !options.entityClasses || options.entityClasses.includes(c));
      const metadata = await this.snapshotMetadata(ref, layout, requested, source.descriptor, source.error);
      errors.push(...metadata.errors);

      this.checkCancelled(options.signal, id);
      run.transition('Finalizing');

      const manifest: SnapshotManifest = {
        manifestVersion: 1,
        snapshotId: id,
        startedAt: startedAt.toISOString(),
        completedAt: this.clock().toISOString(),
        contentState,
        metadataState: metadata.states,
        sourceDefaultBranch: source.descriptor?.defaultBranch ?? null,
        sourceCloneUrl: source.cloneUrl,
        entityCounts: metadata.counts,
        truncatedClasses: metadata.truncated,
        skippedEntityCounts: metadata.skipped,
        refCount,
        errors,
      };
      try {
        await writeJsonAtomic(layout.manifest, manifest);
      } catch (error: unknown) {
        throw new CatastrophicError(error);
      }
      run.transition('Committed');

      const status: BackupStatus = isPartialSnapshot(manifest) ? 'partial' : 'committed';
      if (status === 'partial') {
        this.logger.warn(`⚠️ Committed ${snapshotLabel(id)} with gaps: ${describeGaps(manifest)}`);
      } else {
        this.logger.log(`✅ Committed ${snapshotLabel(id)}`);
      }
      return { status, snapshotId: id, state: 'Committed', transitions: run.transitions, manifest, error: null };
    } catch (error: unknown) {
      const cause = error instanceof CatastrophicError ? error.original : error;
      const summary = toErrorSummary(cause);
      if (run.state !== 'Committed' && run.state !== 'Aborted') run.transition('Aborted');
      await fs.rm(layout.root, { recursive: true, force: true }).catch((rmError: unknown) => {
        this.logger.error(`Failed to remove aborted snapshot ${layout.root}: ${errorMessage(rmError)}`);
      });
      this.logger.error(`🛑 Aborted ${snapshotLabel(id)}: ${summary.message}`);
      return { status: 'aborted', snapshotId: id, state: 'Aborted', transitions: run.transitions, manifest: null, error: summary };
    }
  }

  private async describeSource(ref: RepositoryRef): Promise<{
    descriptor: RepoDescriptor | null;
    cloneUrl: string;
    error: unknown;
  }> {
    const fallback = `${this.settings.cloneBaseUrl}/${ref.owner}/${ref.name}.git`;
    try {
      const descriptor = await this.retrier.run(`Repository ${qualifiedName(ref)}`, () =>
        this.provider.getRepository(ref),
      );
      return { descriptor, cloneUrl: descriptor.cloneUrl ?? fallback, error: null };
    } catch (error: unknown) {
      this.logger.warn(`⚠️ Descriptor for ${qualifiedName(ref)} unavailable, cloning ${fallback}: ${errorMessage(error)}`);
      return { descriptor: null, cloneUrl: fallback, error };
    }
  }

  private async snapshotMetadata(
    ref: RepositoryRef,
    layout: SnapshotLayout,
    requested: readonly EntityClass[],
    descriptor: RepoDescriptor | null,
    descriptorError: unknown,
  ) {
    const states: Record<EntityClass, MetadataState> = {
      repository: 'Skipped',
      issues: 'Skipped',
      pull_requests: 'Skipped',
      releases: 'Skipped',
    };
    const counts: Partial<Record<EntityClass, number>> = {};
    const skipped: Partial<Record<EntityClass, number>> = {};
    const truncated: EntityClass[] = [];
    const errors: ManifestError[] = [];

    if (requested.length > 0) {
      try {
        await fs.mkdir(layout.metadataDir, { recursive: true });
      } catch (error: unknown) {
        throw new CatastrophicError(error);
      }
    }
    for (const entityClass of requested) states[entityClass] = 'Pending';

    const settled = await Promise.allSettled(
      requested.map(async (entityClass) => {
        const artifact = await this.fetchArtifact(entityClass, ref, descriptor, descriptorError);
        if (artifact instanceof BackupError) {
          states[entityClass] = 'Failed';
          errors.push({ component: entityClass, ...toErrorSummary(artifact) });
          this.logger.warn(`⚠️ ${entityClass} of ${qualifiedName(ref)} failed: ${artifact.message}`);
          return;
        }
        try {
          await writeJsonAtomic(layout.metadata[entityClass], artifact);
        } catch (error: unknown) {
          throw new CatastrophicError(error);
        }
        states[entityClass] = 'Complete';
        counts[entityClass] = artifact.fetchedCount;
        if (artifact.truncated) truncated.push(entityClass);
        if (artifact.skipped.length > 0) skipped[entityClass] = artifact.skipped.length;
      }),
    );
    const failure = settled.find((s): s is PromiseRejectedResult => s.status === 'rejected');
    if (failure) throw failure.reason;

    // stable order regardless of completion order
    truncated.sort((a, b) => ENTITY_CLASSES.indexOf(a) - ENTITY_CLASSES.indexOf(b));
    errors.sort((a, b) => componentOrder(a.component) - componentOrder(b.component));
    return { states, counts, skipped, truncated, errors };
  }

  private async fetchArtifact(
    entityClass: EntityClass,
    ref: RepositoryRef,
    descriptor: RepoDescriptor | null,
    descriptorError: unknown,
  ): Promise<MetadataArtifact | BackupError> {
    if (entityClass === 'repository' && !descriptor && isBackupError(descriptorError)) {
      return descriptorError;
    }
    try {
      return await this.metadata.snapshot(entityClass, ref, {
        pageCap: this.settings.pageCap,
        prefetched: entityClass === 'repository' ? descriptor ?? undefined : undefined,
      });
    } catch (error: unknown) {
      if (isBackupError(error)) return error;
      throw error;
    }
  }

  private checkCancelled(signal: AbortSignal | undefined, id: SnapshotId): void {
    if (signal?.aborted) {
      throw new AbortedError(`Backup ${snapshotLabel(id)} cancelled`);
    }
  }

  // ---------- BATCH ----------
  async backupAll(owner?: string, options: BatchOptions = {}): Promise<BatchResult> {
    const startedAt = this.clock().toISOString();
    const label = owner ?? 'authenticated user';
    const descriptors = await this.retrier.run(`List repositories of ${label}`, () =>
      this.provider.listRepositories(owner),
    );
    await this.warnOnLowRateLimit(descriptors.length);

    const results: Record<string, BatchEntry> = {};
    const accepted: RepositoryRef[] = [];
    const seen = new Set<string>();
    for (const d of descriptors) {
      const ref = repositoryRef(d.owner, d.name);
      const key = qualifiedName(ref);
      if (seen.has(key.toLowerCase())) continue;
      seen.add(key.toLowerCase());
      try {
        this.paths.repositoryDir(ref);
        accepted.push(ref);
      } catch (error: unknown) {
        results[key] = { repository: key, status: 'rejected', timestamp: null, error: toErrorSummary(error) };
        this.logger.warn(`🚫 Rejected repository name ${JSON.stringify(key)}: ${errorMessage(error)}`);
      }
    }

    this.logger.log(`📋 Batch backup of ${accepted.length} repositories for ${label} (concurrency ${this.settings.concurrency})`);

    const outcomes = await runWithConcurrency(
      accepted,
      this.settings.concurrency,
      async (ref) => {
        const result = await this.backup(ref, { signal: options.signal, includeMetadata: options.includeMetadata });
        const entry: BatchEntry = {
          repository: qualifiedName(ref),
          status: result.status,
          timestamp: result.snapshotId.timestamp,
          error: result.error,
        };
        options.onResult?.(entry);
        return entry;
      },
      options.signal,
    );

    accepted.forEach((ref, i) => {
      const key = qualifiedName(ref);
      const outcome = outcomes[i];
      if (outcome.status === 'fulfilled') {
        results[key] = outcome.value;
      } else if (outcome.status === 'rejected') {
        results[key] = { repository: key, status: 'aborted', timestamp: null, error: toErrorSummary(outcome.reason) };
        options.onResult?.(results[key]);
      } else {
        results[key] = { repository: key, status: 'skipped', timestamp: null, error: null };
      }
    });

    const counts: Record<BatchStatus, number> = { committed: 0, partial: 0, aborted: 0, skipped: 0, rejected: 0 };
    for (const entry of Object.values(results)) counts[entry.status] += 1;
    this.logger.log(
      `🏁 Batch for ${label} done: ${counts.committed} committed, ${counts.partial} partial, ` +
        `${counts.aborted} aborted, ${counts.skipped} skipped, ${counts.rejected} rejected`,
    );
    return { owner: owner ?? null, startedAt, completedAt: this.clock().toISOString(), results, counts };
  }

  private async warnOnLowRateLimit(repositories: number): Promise<void> {
    try {
      const limit = await this.provider.getRateLimit();
      if (limit.remaining < this.settings.rateLimitThreshold) {
        this.logger.warn(
          `⏳ Only ${limit.remaining}/${limit.limit} API calls left (resets ${limit.resetAt}) for ${repositories} repositories`,
        );
      }
    } catch (error: unknown) {
      this.logger.warn(`⚠️ Could not read rate limit: ${errorMessage(error)}`);
    }
  }
}

function componentOrder(component: ManifestError['component']): number {
  return component === 'content' ? -1 : ENTITY_CLASSES.indexOf(component);
}

function describeGaps(manifest: SnapshotManifest): string {
  const gaps: string[] = [];
  if (manifest.contentState === 'Failed') gaps.push('content failed');
  for (const c of ENTITY_CLASSES) {
    if (manifest.metadataState[c] === 'Failed') gaps.push(`${c} failed`);
  }
  for (const c of manifest.truncatedClasses) gaps.push(`${c} truncated`);
  for (const c of ENTITY_CLASSES) {
    const n = manifest.skippedEntityCounts[c];
    if (n) gaps.push(`${c}: ${n} skipped`);
  }
  return gaps.join(', ');
}

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await fs.stat(dir)).isDirectory();
  } catch {
    return false;
  }
}
