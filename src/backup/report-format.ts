import { qualifiedName } from '../common/repository-ref.js';
import { ENTITY_CLASSES, type SnapshotManifest } from './backup.types.js';
import type { RepositorySummary } from './backup-catalog.js';
import type { RestoreReport } from './restore-engine.js';
import type { BackupResult, BatchResult } from './snapshot-coordinator.js';
import { snapshotLabel } from './snapshot-id.js';

export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${units[unit]}` : `${value.toFixed(1)} ${units[unit]}`;
}

export function formatManifest(manifest: SnapshotManifest, sizeBytes?: number): string {
  const lines = [
    `Snapshot ${snapshotLabel(manifest.snapshotId)}`,
    `  started:   ${manifest.startedAt}`,
    `  completed: ${manifest.completedAt}`,
    `  content:   ${manifest.contentState}${manifest.refCount !== null ? ` (${manifest.refCount} refs)` : ''}`,
  ];
  for (const c of ENTITY_CLASSES) {
    const count = manifest.entityCounts[c];
    const notes: string[] = [];
    if (count !== undefined) notes.push(`${count} records`);
    if (manifest.truncatedClasses.includes(c)) notes.push('truncated');
    const skipped = manifest.skippedEntityCounts[c];
    if (skipped) notes.push(`${skipped} skipped`);
    lines.push(`  ${c.padEnd(14)} ${manifest.metadataState[c]}${notes.length ? ` (${notes.join(', ')})` : ''}`);
  }
  if (manifest.sourceDefaultBranch) lines.push(`  branch:    ${manifest.sourceDefaultBranch}`);
  if (sizeBytes !== undefined) lines.push(`  size:      ${formatBytes(sizeBytes)}`);
  for (const e of manifest.errors) lines.push(`  error [${e.component}] ${e.code}: ${e.message}`);
  return lines.join('\n');
}

export function formatBackupResult(result: BackupResult): string {
  const head = `${result.status.toUpperCase()} ${snapshotLabel(result.snapshotId)}`;
  if (result.manifest) return `${head}\n${formatManifest(result.manifest)}`;
  return `${head}\n  ${result.error?.code ?? 'ABORTED'}: ${result.error?.message ?? 'cancelled'}`;
}

export function formatBatchResult(result: BatchResult): string {
  const lines = [`Batch backup for ${result.owner ?? 'authenticated user'}`];
  for (const key of Object.keys(result.results).sort()) {
    const entry = result.results[key];
    const suffix = entry.error ? ` ${entry.error.code}: ${entry.error.message}` : entry.timestamp ? ` @${entry.timestamp}` : '';
    lines.push(`  ${entry.status.padEnd(9)} ${key}${suffix}`);
  }
  const c = result.counts;
  lines.push(
    `${c.committed} committed, ${c.partial} partial, ${c.aborted} aborted, ${c.skipped} skipped, ${c.rejected} rejected`,
  );
  return lines.join('\n');
}

export function formatSnapshotList(manifests: SnapshotManifest[]): string {
  if (manifests.length === 0) return 'No snapshots';
  return manifests
    .map((m) => {
      const failed = ENTITY_CLASSES.filter((c) => m.metadataState[c] === 'Failed');
      const flags = [
        m.contentState === 'Failed' ? 'content failed' : null,
        failed.length ? `failed: ${failed.join(', ')}` : null,
        m.truncatedClasses.length ? `truncated: ${m.truncatedClasses.join(', ')}` : null,
      ].filter((f): f is string => f !== null);
      return `${m.snapshotId.timestamp}${flags.length ? `  (${flags.join('; ')})` : ''}`;
    })
    .join('\n');
}

export function formatRepositoryList(summaries: RepositorySummary[]): string {
  if (summaries.length === 0) return 'No backups';
  return summaries
    .map((s) => `${qualifiedName(s.repository)}  ${s.snapshotCount} snapshot(s)${s.latest ? `, latest ${s.latest}` : ''}`)
    .join('\n');
}

export function formatRestoreReport(report: RestoreReport): string {
  const lines = [
    `${report.dryRun ? 'Dry run: restore' : 'Restore'} of ${snapshotLabel(report.snapshotId)} into ${report.target}`,
  ];
  const c = report.content;
  lines.push(
    `  content:  ${c.status}` +
      (c.branch ? ` (${c.branch}${c.refCount !== null ? `, ${c.refCount} refs` : ''})` : '') +
      (c.reason ? ` - ${c.reason}` : '') +
      (c.error ? ` - ${c.error.code}: ${c.error.message}` : ''),
  );
  const m = report.metadata;
  lines.push(`  metadata: ${m.status}${m.targetRepository ? ` -> ${m.targetRepository}` : ''}${m.reason ? ` - ${m.reason}` : ''}`);
  for (const e of m.entities) {
    lines.push(`    ${e.outcome.padEnd(12)} ${e.scope} ${e.key}${e.detail ? ` (${e.detail})` : ''}`);
  }
  for (const f of m.failures) lines.push(`    failed       ${f.scope}: ${f.code}: ${f.message}`);
  if (m.truncatedClasses.length) lines.push(`  note: snapshot truncated ${m.truncatedClasses.join(', ')}`);
  if (report.partial) lines.push('  result: partial');
  return lines.join('\n');
}
