import { isBackupError, type BackupErrorCode } from '../common/errors.js';
import type { RestoreReport } from '../backup/restore-engine.js';
import type { BackupResult, BatchResult } from '../backup/snapshot-coordinator.js';

export const EXIT_CODES = {
  OK: 0,
  INVALID_INPUT: 1,
  PARTIAL: 2, // committed with reduced completeness
  ABORTED: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// Errors the caller can fix by changing the request
const CALLER_ERRORS: ReadonlySet<BackupErrorCode> = new Set<BackupErrorCode>([
  'INVALID_IDENTIFIER',
  'CONFIGURATION_ERROR',
  'SNAPSHOT_NOT_FOUND',
  'SNAPSHOT_COMMITTED',
  'TARGET_NOT_EMPTY',
  'CONCURRENT_BACKUP',
]);

export function exitCodeForError(error: unknown): ExitCode {
  if (isBackupError(error) && CALLER_ERRORS.has(error.code)) return EXIT_CODES.INVALID_INPUT;
  return EXIT_CODES.ABORTED;
}

export function exitCodeForBackup(result: BackupResult): ExitCode {
  switch (result.status) {
    case 'committed':
      return EXIT_CODES.OK;
    case 'partial':
      return EXIT_CODES.PARTIAL;
    case 'aborted':
      return EXIT_CODES.ABORTED;
  }
}

/** 0 when every repository committed cleanly, 3 when nothing committed or the run was cancelled, else 2. */
export function exitCodeForBatch(result: BatchResult): ExitCode {
  const { committed, partial, aborted, skipped, rejected } = result.counts;
  if (skipped > 0 || committed + partial === 0) {
    return committed + partial + aborted + skipped + rejected === 0 ? EXIT_CODES.OK : EXIT_CODES.ABORTED;
  }
  return partial + aborted + rejected > 0 ? EXIT_CODES.PARTIAL : EXIT_CODES.OK;
}

export function exitCodeForRestore(report: RestoreReport): ExitCode {
  return report.partial ? EXIT_CODES.PARTIAL : EXIT_CODES.OK;
}
