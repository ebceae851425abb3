import type { ErrorSummary } from '../common/errors.js';
import type { RepositoryRef } from '../common/repository-ref.js';

export const ENTITY_CLASSES = ['repository', 'issues', 'pull_requests', 'releases'] as const;
export type EntityClass = (typeof ENTITY_CLASSES)[number];

export function isEntityClass(value: string): value is EntityClass {
  return ENTITY_CLASSES.some((c) => c === value);
}

export const CONTENT_STATES = ['Pending', 'Complete', 'Failed'] as const;
export type ContentState = (typeof CONTENT_STATES)[number];

export const METADATA_STATES = ['Pending', 'Complete', 'Failed', 'Skipped'] as const;
export type MetadataState = (typeof METADATA_STATES)[number];

export const SNAPSHOT_STATES = [
  'Created',
  'ContentInFlight',
  'MetadataInFlight',
  'Finalizing',
  'Committed',
  'Aborted',
] as const;
export type SnapshotState = (typeof SNAPSHOT_STATES)[number];

export interface SnapshotId {
  repository: RepositoryRef;
  timestamp: string; // YYYYMMDD-HHMMSS[-N], UTC
}

export interface ManifestError extends ErrorSummary {
  component: 'content' | EntityClass;
}

export interface SnapshotManifest {
  manifestVersion: 1;
  snapshotId: SnapshotId;
  startedAt: string;
  completedAt: string;
  contentState: ContentState;
  metadataState: Record<EntityClass, MetadataState>;
  sourceDefaultBranch: string | null;
  sourceCloneUrl: string | null;
  entityCounts: Partial<Record<EntityClass, number>>;
  truncatedClasses: EntityClass[];
  skippedEntityCounts: Partial<Record<EntityClass, number>>;
  refCount: number | null;
  errors: ManifestError[];
}

export interface SkippedEntity {
  key: string; // e.g. "#12"
  reason: string;
}

export interface MetadataArtifact<T = unknown> {
  entityClass: EntityClass;
  fetchedCount: number;
  totalCount: number | null; // null when truncated: the provider had more
  truncated: boolean;
  fetchedAt: string;
  records: T[];
  skipped: SkippedEntity[];
}

export interface ContentMirror {
  path: string;
  refCount: number;
}

export function metadataFileName(entityClass: EntityClass): string {
  return `${entityClass}.json`;
}

/**
 * Committed with reduced completeness: a failed component, a truncated class
 * or records whose enrichment was skipped. Classes left out on request do not
 * count.
 */
export function isPartialSnapshot(manifest: SnapshotManifest): boolean {
  return (
    manifest.contentState === 'Failed' ||
    ENTITY_CLASSES.some((c) => manifest.metadataState[c] === 'Failed') ||
    manifest.truncatedClasses.length > 0 ||
    Object.values(manifest.skippedEntityCounts).some((n) => (n ?? 0) > 0)
  );
}

export function isCompleteExport(artifact: MetadataArtifact): boolean {
  return !artifact.truncated && artifact.skipped.length === 0;
}
