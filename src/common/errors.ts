// Error taxonomy shared by the provider, the workspace and the backup engine.

export const BACKUP_ERROR_CODES = [
  'INVALID_IDENTIFIER',
  'AUTH_ERROR',
  'NETWORK_ERROR',
  'SOURCE_UNAVAILABLE',
  'REPOSITORY_GONE',
  'TARGET_NOT_EMPTY',
  'SNAPSHOT_NOT_FOUND',
  'SNAPSHOT_COMMITTED',
  'CONCURRENT_BACKUP',
  'CONFIGURATION_ERROR',
  'WORKSPACE_ERROR',
  'ABORTED',
  'INTERNAL_ERROR',
] as const;

export type BackupErrorCode = (typeof BACKUP_ERROR_CODES)[number];

export interface ErrorSummary {
  code: BackupErrorCode;
  message: string;
}

export abstract class BackupError extends Error {
  abstract readonly code: BackupErrorCode;
  readonly retryable: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad repository reference, snapshot id or path. Caller error, never retried. */
export class InvalidIdentifierError extends BackupError {
  readonly code = 'INVALID_IDENTIFIER';
}

/** Credential missing, invalid, expired or lacking permission. */
export class AuthError extends BackupError {
  readonly code = 'AUTH_ERROR';
}

/**
 * Transient failure (transport, 5xx, rate limit). The only retryable error;
 * `retryAfterMs` carries the provider's hint when it sent one.
 */
export class NetworkError extends BackupError {
  readonly code = 'NETWORK_ERROR';
  override readonly retryable = true;
  readonly retryAfterMs: number | null;

  constructor(
    message: string,
    options?: { cause?: unknown; retryAfterMs?: number | null },
  ) {
    super(message, options);
    this.retryAfterMs = options?.retryAfterMs ?? null;
  }
}

/** The remote resource cannot be served (404, 410, 422). */
export class SourceUnavailableError extends BackupError {
  readonly code = 'SOURCE_UNAVAILABLE';
}

/** The upstream repository no longer exists for git. */
export class RepositoryGoneError extends BackupError {
  readonly code = 'REPOSITORY_GONE';
}

export class TargetNotEmptyError extends BackupError {
  readonly code = 'TARGET_NOT_EMPTY';
}

export class SnapshotNotFoundError extends BackupError {
  readonly code = 'SNAPSHOT_NOT_FOUND';
}

/** Committed snapshots are immutable. */
export class SnapshotCommittedError extends BackupError {
  readonly code = 'SNAPSHOT_COMMITTED';
}

export class ConcurrentBackupError extends BackupError {
  readonly code = 'CONCURRENT_BACKUP';
}

export class ConfigurationError extends BackupError {
  readonly code = 'CONFIGURATION_ERROR';
}

/** Local git or filesystem failure that is not one of the above. */
export class WorkspaceError extends BackupError {
  readonly code = 'WORKSPACE_ERROR';
}

export class AbortedError extends BackupError {
  readonly code = 'ABORTED';
}

export function isBackupError(error: unknown): error is BackupError {
  return error instanceof BackupError;
}

export function isRetryable(error: unknown): boolean {
  return isBackupError(error) && error.retryable;
}

// Matched by shape: errors raised by Node's fs are not always instances of this realm's Error
export function systemErrorCode(error: unknown): string | number | null {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    if (typeof code === 'string' || typeof code === 'number') return code;
  }
  return null;
}

export function isSystemError(error: unknown, code: string): boolean {
  return systemErrorCode(error) === code;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

export function toErrorSummary(error: unknown): ErrorSummary {
  if (isBackupError(error)) {
    return { code: error.code, message: error.message };
  }
  return { code: 'INTERNAL_ERROR', message: errorMessage(error) };
}
