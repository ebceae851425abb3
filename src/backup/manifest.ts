import { randomBytes } from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { plainToInstance, Type } from 'class-transformer';
import {
  Equals,
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsISO8601,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  Matches,
  Min,
  ValidateNested,
  validateSync,
} from 'class-validator';

import { BACKUP_ERROR_CODES, type BackupErrorCode, isSystemError } from '../common/errors.js';
import { repositoryRef } from '../common/repository-ref.js';
import {
  type ContentState,
  ENTITY_CLASSES,
  type EntityClass,
  type ManifestError,
  type MetadataArtifact,
  type MetadataState,
  type SnapshotManifest,
} from './backup.types.js';
import { TIMESTAMP_PATTERN } from './path-resolver.js';

export const MANIFEST_FILE = 'manifest.json';

// Only terminal states may appear in a committed manifest
const TERMINAL_CONTENT: ContentState[] = ['Complete', 'Failed'];
const TERMINAL_METADATA: MetadataState[] = ['Complete', 'Failed', 'Skipped'];
const COMPONENTS: ManifestError['component'][] = ['content', ...ENTITY_CLASSES];

// ---------- DOCUMENT SHAPES ----------
class RepositoryRefDocument {
  @IsString() @IsNotEmpty() owner!: string;
  @IsString() @IsNotEmpty() name!: string;
}

class SnapshotIdDocument {
  @ValidateNested() @Type(() => RepositoryRefDocument)
  repository!: RepositoryRefDocument;

  @Matches(TIMESTAMP_PATTERN)
  timestamp!: string;
}

class MetadataStateDocument {
  @IsIn(TERMINAL_METADATA) repository!: MetadataState;
  @IsIn(TERMINAL_METADATA) issues!: MetadataState;
  @IsIn(TERMINAL_METADATA) pull_requests!: MetadataState;
  @IsIn(TERMINAL_METADATA) releases!: MetadataState;
}

class ManifestErrorDocument {
  @IsIn(COMPONENTS) component!: ManifestError['component'];
  @IsIn(BACKUP_ERROR_CODES) code!: BackupErrorCode;
  @IsString() message!: string;
}

class ManifestDocument {
  @Equals(1) manifestVersion!: 1;

  @ValidateNested() @Type(() => SnapshotIdDocument)
  snapshotId!: SnapshotIdDocument;

  @IsISO8601() startedAt!: string;
  @IsISO8601() completedAt!: string;

  @IsIn(TERMINAL_CONTENT) contentState!: ContentState;

  @ValidateNested() @Type(() => MetadataStateDocument)
  metadataState!: MetadataStateDocument;

  @IsOptional() @IsString() sourceDefaultBranch!: string | null;
  @IsOptional() @IsString() sourceCloneUrl!: string | null;

  @IsObject() entityCounts!: Record<string, unknown>;
  @IsObject() skippedEntityCounts!: Record<string, unknown>;

  @IsArray() @IsIn(ENTITY_CLASSES, { each: true })
  truncatedClasses!: EntityClass[];

  @IsOptional() @IsInt() @Min(0) refCount!: number | null;

  @IsArray() @ValidateNested({ each: true }) @Type(() => ManifestErrorDocument)
  errors!: ManifestErrorDocument[];
}

class SkippedEntityDocument {
  @IsString() key!: string;
  @IsString() reason!: string;
}

class ArtifactDocument {
  @IsIn(ENTITY_CLASSES) entityClass!: EntityClass;
  @IsInt() @Min(0) fetchedCount!: number;
  @IsOptional() @IsInt() @Min(0) totalCount!: number | null;
  @IsBoolean() truncated!: boolean;
  @IsISO8601() fetchedAt!: string;
  @IsArray() records!: unknown[];
  @IsArray() @ValidateNested({ each: true }) @Type(() => SkippedEntityDocument)
  skipped!: SkippedEntityDocument[];
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function countsOf(value: Record<string, unknown>): Partial<Record<EntityClass, number>> {
  const counts: Partial<Record<EntityClass, number>> = {};
  for (const entityClass of ENTITY_CLASSES) {
    const n = value[entityClass];
    if (typeof n === 'number' && Number.isInteger(n) && n >= 0) counts[entityClass] = n;
  }
  return counts;
}

function validated<T extends object>(cls: new () => T, plain: unknown): T | null {
  if (!isPlainObject(plain)) return null;
  const doc = plainToInstance(cls, plain);
  return validateSync(doc).length === 0 ? doc : null;
}

/** A committed manifest, or null when `plain` is not one. */
export function parseManifest(plain: unknown): SnapshotManifest | null {
  const doc = validated(ManifestDocument, plain);
  if (!doc) return null;
  return {
    manifestVersion: 1,
    snapshotId: {
      repository: repositoryRef(doc.snapshotId.repository.owner, doc.snapshotId.repository.name),
      timestamp: doc.snapshotId.timestamp,
    },
    startedAt: doc.startedAt,
    completedAt: doc.completedAt,
    contentState: doc.contentState,
    metadataState: {
      repository: doc.metadataState.repository,
      issues: doc.metadataState.issues,
      pull_requests: doc.metadataState.pull_requests,
      releases: doc.metadataState.releases,
    },
    sourceDefaultBranch: doc.sourceDefaultBranch ?? null,
    sourceCloneUrl: doc.sourceCloneUrl ?? null,
    entityCounts: countsOf(doc.entityCounts),
    truncatedClasses: doc.truncatedClasses,
    skippedEntityCounts: countsOf(doc.skippedEntityCounts),
    refCount: doc.refCount ?? null,
    errors: doc.errors.map((e) => ({ component: e.component, code: e.code, message: e.message })),
  };
}

export function parseArtifact(plain: unknown): MetadataArtifact | null {
  const doc = validated(ArtifactDocument, plain);
  if (!doc) return null;
  return {
    entityClass: doc.entityClass,
    fetchedCount: doc.fetchedCount,
    totalCount: doc.totalCount ?? null,
    truncated: doc.truncated,
    fetchedAt: doc.fetchedAt,
    records: doc.records,
    skipped: doc.skipped.map((s) => ({ key: s.key, reason: s.reason })),
  };
}

function isMissing(error: unknown): boolean {
  return isSystemError(error, 'ENOENT');
}

async function readJson(file: string): Promise<unknown> {
  try {
    const text = await fs.readFile(file, 'utf8');
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error: unknown) {
    // a torn or missing file reads as "no document"
    if (isMissing(error) || error instanceof SyntaxError) return undefined;
    throw error;
  }
}

export async function readManifest(snapshotDir: string): Promise<SnapshotManifest | null> {
  return parseManifest(await readJson(path.join(snapshotDir, MANIFEST_FILE)));
}

export async function readArtifact(file: string): Promise<MetadataArtifact | null> {
  return parseArtifact(await readJson(file));
}

/**
 * Write JSON through a temp file in the same directory, fsync, then rename.
 * Readers see the old file or the new one, never a torn write.
 */
export async function writeJsonAtomic(file: string, data: unknown): Promise<void> {
  const tmp = path.join(path.dirname(file), `.${path.basename(file)}.${randomBytes(6).toString('hex')}.tmp`);
  const handle = await fs.open(tmp, 'w');
  try {
    await handle.writeFile(`${JSON.stringify(data, null, 2)}\n`, 'utf8');
    await handle.sync();
  } finally {
    await handle.close();
  }
  try {
    await fs.rename(tmp, file);
  } catch (error: unknown) {
    await fs.rm(tmp, { force: true });
    throw error;
  }
}
