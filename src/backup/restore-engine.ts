import { promises as fs } from 'node:fs';
import path from 'node:path';
import { Logger } from '@nestjs/common';
import { plainToInstance, Type } from 'class-transformer';
import { IsArray, IsBoolean, IsIn, IsInt, IsOptional, IsString, ValidateNested, validateSync } from 'class-validator';

import {
  type ErrorSummary,
  errorMessage,
  InvalidIdentifierError,
  isSystemError,
  SnapshotNotFoundError,
  TargetNotEmptyError,
  toErrorSummary,
} from '../common/errors.js';
import { qualifiedName, type RepositoryRef } from '../common/repository-ref.js';
import type {
  LabelRecord,
  ProviderPage,
  RepositoryProvider,
} from '../github/repository-provider.interface.js';
import type { VersionControlWorkspace } from '../workspace/version-control-workspace.interface.js';
import type { EntityClass, SnapshotId, SnapshotManifest } from './backup.types.js';
import type { BackupCatalog } from './backup-catalog.js';
import { readArtifact } from './manifest.js';
import { isSameOrInside, type PathResolver, type SnapshotLayout } from './path-resolver.js';
import type { Retrier } from './retrier.js';
import { snapshotLabel } from './snapshot-id.js';

export interface RestoreOptions {
  overwrite?: boolean; // default false
  content?: boolean; // default true
  metadata?: boolean; // default false
  dryRun?: boolean; // report only, mutate nothing
  intoRepository?: RepositoryRef; // default: the snapshot's own repository
  confineToWorkspace?: boolean; // target must lie below WORKSPACE_DIR
}

export type StepStatus = 'completed' | 'planned' | 'skipped' | 'failed';
export type EntityOutcome = 'created' | 'exists' | 'would-create' | 'failed' | 'unsupported';
export type ReplayScope = 'labels' | 'issues' | 'releases' | 'pull_requests';

export interface EntityReport {
  scope: ReplayScope;
  key: string; // label name, issue title, release tag
  outcome: EntityOutcome;
  detail: string | null;
}

export interface ContentStepReport {
  status: StepStatus;
  reason: string | null;
  branch: string | null;
  refCount: number | null;
  error: ErrorSummary | null;
}

export interface MetadataStepReport {
  status: StepStatus;
  reason: string | null;
  targetRepository: string | null;
  entities: EntityReport[];
  failures: Array<ErrorSummary & { scope: ReplayScope }>;
  truncatedClasses: EntityClass[];
}

export interface RestoreReport {
  snapshotId: SnapshotId;
  target: string;
  dryRun: boolean;
  content: ContentStepReport;
  metadata: MetadataStepReport;
  partial: boolean;
}

// ---------- REPLAY RECORD SHAPES ----------
class LabelReplay {
  @IsString() name!: string;
  @IsOptional() @IsString() color!: string | null;
  @IsOptional() @IsString() description!: string | null;
}

class IssueReplay {
  @IsInt() number!: number;
  @IsString() title!: string;
  @IsOptional() @IsString() body!: string | null;
  @IsIn(['open', 'closed']) state!: 'open' | 'closed';
  @IsArray() @ValidateNested({ each: true }) @Type(() => LabelReplay)
  labels!: LabelReplay[];
}

class ReleaseReplay {
  @IsString() tagName!: string;
  @IsOptional() @IsString() name!: string | null;
  @IsOptional() @IsString() body!: string | null;
  @IsBoolean() draft!: boolean;
  @IsBoolean() prerelease!: boolean;
  @IsOptional() @IsString() targetCommitish!: string | null;
}

function replayRecord<T extends object>(cls: new () => T, record: unknown): T | null {
  if (typeof record !== 'object' || record === null || Array.isArray(record)) return null;
  const doc = plainToInstance(cls, record);
  return validateSync(doc).length === 0 ? doc : null;
}

async function isNonEmpty(target: string): Promise<boolean> {
  try {
    const stat = await fs.stat(target);
    if (!stat.isDirectory()) return true;
    return (await fs.readdir(target)).length > 0;
  } catch (error: unknown) {
    if (isSystemError(error, 'ENOENT')) return false;
    throw error;
  }
}

export interface RestoreEngineSettings {
  workspaceDir: string;
  pageCap: number;
  perPage: number;
}

/**
 * Rebuilds a working copy from a committed snapshot and optionally replays
 * its metadata into a remote repository. Every check that can refuse the
 * restore runs before the target is touched.
 */
export class RestoreEngine {
  private readonly logger = new Logger(RestoreEngine.name);

  constructor(
    private readonly catalog: BackupCatalog,
    private readonly paths: PathResolver,
    private readonly workspace: VersionControlWorkspace,
    private readonly provider: RepositoryProvider,
    private readonly retrier: Retrier,
    private readonly settings: RestoreEngineSettings,
  ) {}

  resolveTarget(target: string): string {
    return path.resolve(this.settings.workspaceDir, target);
  }

  async restore(id: SnapshotId, target: string, options: RestoreOptions = {}): Promise<RestoreReport> {
    const manifest = await this.catalog.get(id);
    if (!manifest) {
      throw new SnapshotNotFoundError(`No committed snapshot ${snapshotLabel(id)}`);
    }
    const layout = this.paths.layout(id);
    const targetPath = this.resolveTarget(target);
    this.assertTargetAllowed(targetPath, options.confineToWorkspace ?? false);
    const dryRun = options.dryRun ?? false;
    const wantContent = options.content ?? true;
    const runContent = wantContent && manifest.contentState === 'Complete';

    // ---------- PRE-FLIGHT ----------
    const occupied = runContent && (await isNonEmpty(targetPath));
    if (occupied) {
      if (!options.overwrite) {
        throw new TargetNotEmptyError(`Restore target ${targetPath} is not empty`);
      }
      if ((await this.workspace.isRepository(targetPath)) && (await this.workspace.isDirty(targetPath))) {
        throw new TargetNotEmptyError(`Restore target ${targetPath} has uncommitted changes`);
      }
    }

    this.logger.log(`🔄 Restoring ${snapshotLabel(id)} into ${targetPath}${dryRun ? ' (dry run)' : ''}`);

    const content = !wantContent
      ? skippedContent('not requested')
      : !runContent
        ? skippedContent('snapshot content was not captured')
        : dryRun
          ? { status: 'planned' as const, reason: null, branch: manifest.sourceDefaultBranch, refCount: manifest.refCount, error: null }
          : await this.restoreContent(manifest, layout, targetPath, occupied);

    const metadata = options.metadata
      ? await this.replayMetadata(manifest, layout, options.intoRepository ?? id.repository, dryRun)
      : skippedMetadata('not requested');

    const partial =
      content.status === 'failed' ||
      (wantContent && !runContent) ||
      metadata.failures.length > 0 ||
      metadata.entities.some((e) => e.outcome === 'failed') ||
      metadata.truncatedClasses.length > 0;

    const report: RestoreReport = { snapshotId: id, target: targetPath, dryRun, content, metadata, partial };
    if (partial) {
      this.logger.warn(`⚠️ Restore of ${snapshotLabel(id)} finished with gaps`);
    } else {
      this.logger.log(`✅ Restore of ${snapshotLabel(id)} finished`);
    }
    return report;
  }

  private assertTargetAllowed(targetPath: string, confine: boolean): void {
    if (this.paths.overlapsBackupRoot(targetPath)) {
      throw new InvalidIdentifierError(`Restore target ${targetPath} overlaps the backup root ${this.paths.backupRoot}`);
    }
    const workspaceDir = path.resolve(this.settings.workspaceDir);
    if (confine && (targetPath === workspaceDir || !isSameOrInside(workspaceDir, targetPath))) {
      throw new InvalidIdentifierError(`Restore target ${targetPath} is outside ${workspaceDir}`);
    }
  }

  // ---------- CONTENT ----------
  private async restoreContent(
    manifest: SnapshotManifest,
    layout: SnapshotLayout,
    targetPath: string,
    occupied: boolean,
  ): Promise<ContentStepReport> {
    const existedBefore = await fs
      .stat(targetPath)
      .then(() => true)
      .catch(() => false);
    try {
      if (occupied) await fs.rm(targetPath, { recursive: true, force: true });
      await this.workspace.cloneFromMirror(layout.content, targetPath, {
        branch: manifest.sourceDefaultBranch,
        remoteUrl: manifest.sourceCloneUrl,
      });
      const refs = await this.workspace.listRefs(targetPath);
      const branch = await this.workspace.activeBranch(targetPath);
      this.logger.log(`📂 Checked out ${branch} with ${refs.length} refs in ${targetPath}`);
      return { status: 'completed', reason: null, branch, refCount: refs.length, error: null };
    } catch (error: unknown) {
      this.logger.error(`❌ Checkout into ${targetPath} failed: ${errorMessage(error)}`);
      if (existedBefore && !occupied) {
        // leave the caller's empty directory in place
        await this.emptyDirectory(targetPath);
      } else {
        await fs.rm(targetPath, { recursive: true, force: true });
      }
      return { status: 'failed', reason: null, branch: null, refCount: null, error: toErrorSummary(error) };
    }
  }

  private async emptyDirectory(dir: string): Promise<void> {
    for (const entry of await fs.readdir(dir)) {
      await fs.rm(path.join(dir, entry), { recursive: true, force: true });
    }
  }

  // ---------- METADATA ----------
  private async replayMetadata(
    manifest: SnapshotManifest,
    layout: SnapshotLayout,
    into: RepositoryRef,
    dryRun: boolean,
  ): Promise<MetadataStepReport> {
    const report: MetadataStepReport = {
      status: dryRun ? 'planned' : 'completed',
      reason: null,
      targetRepository: qualifiedName(into),
      entities: [],
      failures: [],
      truncatedClasses: [...manifest.truncatedClasses],
    };
    const fail = (scope: ReplayScope, error: unknown) => {
      report.failures.push({ scope, ...toErrorSummary(error) });
      this.logger.warn(`⚠️ Replay of ${scope} into ${qualifiedName(into)} failed: ${errorMessage(error)}`);
    };

    const issues = await this.loadRecords(manifest, layout, 'issues', IssueReplay, report, fail);
    const releases = await this.loadRecords(manifest, layout, 'releases', ReleaseReplay, report, fail);

    // labels first so issues can reference them
    const labels = new Map<string, LabelRecord>();
    for (const issue of issues) {
      for (const l of issue.labels) {
        if (!labels.has(l.name)) labels.set(l.name, { name: l.name, color: l.color ?? null, description: l.description ?? null });
      }
    }
    try {
      const existing = await this.retrier.run(`Labels ${qualifiedName(into)}`, () => this.provider.listLabels(into));
      const names = new Set(existing.map((l) => l.name.toLowerCase()));
      for (const label of labels.values()) {
        await this.replayOne(report, 'labels', label.name, names.has(label.name.toLowerCase()), dryRun, async () => {
          await this.provider.createLabel(into, label);
          return null;
        });
      }
    } catch (error: unknown) {
      fail('labels', error);
    }

    try {
      const existing = await this.listAll(`Issues ${qualifiedName(into)}`, (page) =>
        this.provider.listIssues(into, page, this.settings.perPage),
      );
      const titles = new Set(existing.map((i) => i.title));
      for (const issue of issues) {
        await this.replayOne(report, 'issues', issue.title, titles.has(issue.title), dryRun, async () => {
          const created = await this.provider.createIssue(into, {
            title: issue.title,
            body: issue.body ?? null,
            labels: issue.labels.map((l) => l.name),
          });
          if (issue.state === 'closed') await this.provider.closeIssue(into, created.number);
          titles.add(issue.title);
          return created.url;
        });
      }
    } catch (error: unknown) {
      fail('issues', error);
    }

    try {
      const existing = await this.listAll(`Releases ${qualifiedName(into)}`, (page) =>
        this.provider.listReleases(into, page, this.settings.perPage),
      );
      const tags = new Set(existing.map((r) => r.tagName));
      for (const release of releases) {
        await this.replayOne(report, 'releases', release.tagName, tags.has(release.tagName), dryRun, async () => {
          const created = await this.provider.createRelease(into, {
            tagName: release.tagName,
            name: release.name ?? null,
            body: release.body ?? null,
            draft: release.draft,
            prerelease: release.prerelease,
            targetCommitish: release.targetCommitish ?? null,
          });
          return created.url;
        });
      }
    } catch (error: unknown) {
      fail('releases', error);
    }

    const pullRequests = manifest.entityCounts.pull_requests ?? 0;
    if (manifest.metadataState.pull_requests === 'Complete' && pullRequests > 0) {
      report.entities.push({
        scope: 'pull_requests',
        key: `${pullRequests} pull requests`,
        outcome: 'unsupported',
        detail: 'pull requests are kept in the snapshot but not replayed',
      });
    }

    if (!dryRun && (report.failures.length > 0 || report.entities.some((e) => e.outcome === 'failed'))) {
      report.status = 'failed';
    }
    return report;
  }

  private async loadRecords<T extends object>(
    manifest: SnapshotManifest,
    layout: SnapshotLayout,
    entityClass: 'issues' | 'releases',
    cls: new () => T,
    report: MetadataStepReport,
    fail: (scope: ReplayScope, error: unknown) => void,
  ): Promise<T[]> {
    if (manifest.metadataState[entityClass] !== 'Complete') return [];
    const artifact = await readArtifact(layout.metadata[entityClass]);
    if (!artifact) {
      fail(entityClass, new SnapshotNotFoundError(`${entityClass} artifact is unreadable`));
      return [];
    }
    const records: T[] = [];
    artifact.records.forEach((raw, i) => {
      const record = replayRecord(cls, raw);
      if (record) {
        records.push(record);
      } else {
        report.entities.push({ scope: entityClass, key: `record ${i}`, outcome: 'failed', detail: 'malformed record' });
      }
    });
    return records;
  }

  private async replayOne(
    report: MetadataStepReport,
    scope: ReplayScope,
    key: string,
    exists: boolean,
    dryRun: boolean,
    create: () => Promise<string | null>,
  ): Promise<void> {
    if (exists) {
      report.entities.push({ scope, key, outcome: 'exists', detail: null });
      return;
    }
    if (dryRun) {
      report.entities.push({ scope, key, outcome: 'would-create', detail: null });
      return;
    }
    try {
      const url = await create();
      report.entities.push({ scope, key, outcome: 'created', detail: url });
    } catch (error: unknown) {
      report.entities.push({ scope, key, outcome: 'failed', detail: errorMessage(error) });
    }
  }

  private async listAll<T>(label: string, fetchPage: (page: number) => Promise<ProviderPage<T>>): Promise<T[]> {
    const items: T[] = [];
    for (let page = 1; page <= this.settings.pageCap; page++) {
      const result = await this.retrier.run(`${label} page ${page}`, () => fetchPage(page));
      items.push(...result.items);
      if (!result.hasNext) break;
    }
    return items;
  }
}

function skippedContent(reason: string): ContentStepReport {
  return { status: 'skipped', reason, branch: null, refCount: null, error: null };
}

function skippedMetadata(reason: string): MetadataStepReport {
  return { status: 'skipped', reason, targetRepository: null, entities: [], failures: [], truncatedClasses: [] };
}
