import { buildManifest } from '../../backup/__tests__/fakes.js';
import { assertTimestamp } from '../../backup/path-resolver.js';
import type { RestoreReport } from '../../backup/restore-engine.js';
import type { BackupStatus, BackupResult, BatchResult } from '../../backup/snapshot-coordinator.js';
import { NetworkError, SnapshotNotFoundError, TargetNotEmptyError } from '../../common/errors.js';
import { repositoryRef } from '../../common/repository-ref.js';
import { type CliBackupService, type CliDeps, runCli } from '../backup-cli.js';
import { exitCodeForBatch, exitCodeForError } from '../exit-codes.js';

const ID = { repository: repositoryRef('acme', 'widgets'), timestamp: '20240101-000000' };

function backupResult(status: BackupStatus): BackupResult {
  return {
    status,
    snapshotId: ID,
    state: status === 'aborted' ? 'Aborted' : 'Committed',
    transitions: [],
    manifest: status === 'aborted' ? null : buildManifest(),
    error: status === 'aborted' ? { code: 'ABORTED', message: 'Backup acme/widgets@20240101-000000 cancelled' } : null,
  };
}

function restoreReport(partial: boolean): RestoreReport {
  return {
    snapshotId: ID,
    target: '/work/widgets',
    dryRun: false,
    content: { status: 'completed', reason: null, branch: 'main', refCount: 3, error: null },
    metadata: { status: 'skipped', reason: 'not requested', targetRepository: null, entities: [], failures: [], truncatedClasses: [] },
    partial,
  };
}

function batchResult(counts: BatchResult['counts']): BatchResult {
  return { owner: 'acme', startedAt: '2024-01-01T00:00:00.000Z', completedAt: '2024-01-01T00:01:00.000Z', results: {}, counts };
}

interface Recorded {
  method: string;
  args: unknown[];
}

function fakeService(calls: Recorded[], overrides: Partial<CliBackupService> = {}): CliBackupService {
  return {
    snapshotId: (owner, name, timestamp) => {
      assertTimestamp(timestamp);
      return { repository: repositoryRef(owner, name), timestamp };
    },
    backup: async (ref, options) => {
      calls.push({ method: 'backup', args: [ref, options] });
      return backupResult('committed');
    },
    backupAll: async (owner) => {
      calls.push({ method: 'backupAll', args: [owner] });
      return batchResult({ committed: 2, partial: 0, aborted: 0, skipped: 0, rejected: 0 });
    },
    resume: async (id) => {
      calls.push({ method: 'resume', args: [id] });
      return backupResult('committed');
    },
    restore: async (id, request) => {
      calls.push({ method: 'restore', args: [id, request] });
      return restoreReport(false);
    },
    listRepositories: async () => [{ repository: ID.repository, snapshotCount: 1, latest: ID.timestamp }],
    listSnapshots: async () => ({ repository: 'acme/widgets', snapshots: [buildManifest()], incomplete: ['20231231-000000'] }),
    getSnapshot: async () => null,
    ...overrides,
  };
}

describe('runCli', () => {
  let out: string[];
  let err: string[];
  let calls: Recorded[];

  const run = (args: string[], overrides: Partial<CliBackupService> = {}) => {
    const deps: CliDeps = {
      service: fakeService(calls, overrides),
      provider: { getRateLimit: async () => ({ limit: 5000, remaining: 12, resetAt: '2024-01-01T01:00:00.000Z' }) },
      out: (text) => out.push(text),
      err: (text) => err.push(text),
    };
    return runCli(['node', 'repo-vault', ...args], deps);
  };

  beforeEach(() => {
    out = [];
    err = [];
    calls = [];
  });

  it('exits 0 after a clean backup and prints the result', async () => {
    expect(await run(['backup', 'acme/widgets'])).toBe(0);
    expect(out[0].split('\n')[0]).toBe('COMMITTED acme/widgets@20240101-000000');
  });

  it('passes metadata selection through', async () => {
    await run(['backup', 'acme/widgets', '--only', 'issues,releases']);
    await run(['backup', 'acme/widgets', '--no-metadata']);

    expect(calls[0].args[1]).toMatchObject({ includeMetadata: true, entityClasses: ['issues', 'releases'] });
    expect(calls[1].args[1]).toMatchObject({ includeMetadata: false });
  });

  it.each([
    ['partial', 2],
    ['aborted', 3],
  ] as const)('exits %s backups with %i', async (status, code) => {
    expect(await run(['backup', 'acme/widgets'], { backup: async () => backupResult(status) })).toBe(code);
  });

  it('rejects unknown entity classes as invalid input', async () => {
    expect(await run(['backup', 'acme/widgets', '--only', 'wikis'])).toBe(1);
    expect(err.join('\n')).toContain('Unknown entity class "wikis"');
    expect(calls).toEqual([]);
  });

  it('rejects malformed repository references', async () => {
    expect(await run(['backup', 'acme'])).toBe(1);
    expect(err).toEqual(['INVALID_IDENTIFIER: Repository must be given as "owner/name", got "acme"']);
  });

  it('forwards restore options and reports partial restores with 2', async () => {
    const code = await run(
      ['restore', 'acme/widgets', '20240101-000000', './w', '--no-content', '--metadata', '--dry-run', '--into', 'acme/copy'],
      {
        restore: async (id, request) => {
          calls.push({ method: 'restore', args: [id, request] });
          return restoreReport(true);
        },
      },
    );

    expect(code).toBe(2);
    expect(calls[0].args).toEqual([
      ID,
      { target: './w', content: false, metadata: true, dryRun: true, intoRepository: 'acme/copy' },
    ]);
  });

  it('exits 1 when the restore target is not empty', async () => {
    const code = await run(['restore', 'acme/widgets', '20240101-000000', 'w'], {
      restore: async () => {
        throw new TargetNotEmptyError('Restore target /work/w is not empty');
      },
    });

    expect(code).toBe(1);
    expect(err).toEqual(['TARGET_NOT_EMPTY: Restore target /work/w is not empty']);
  });

  it('reports unknown snapshots and bad timestamps as invalid input', async () => {
    expect(await run(['show', 'acme/widgets', '20240101-000000'])).toBe(1);
    expect(err[0]).toBe('SNAPSHOT_NOT_FOUND: No committed snapshot acme/widgets@20240101-000000');
    expect(await run(['show', 'acme/widgets', 'latest'])).toBe(1);
    expect(err[1]).toBe('INVALID_IDENTIFIER: Invalid snapshot timestamp: "latest"');
  });

  it('maps batch counts onto the exit code', async () => {
    expect(await run(['backup-all', 'acme'])).toBe(0);
    expect(calls[0]).toEqual({ method: 'backupAll', args: ['acme'] });

    const mixed = batchResult({ committed: 2, partial: 0, aborted: 1, skipped: 0, rejected: 0 });
    expect(await run(['backup-all'], { backupAll: async () => mixed })).toBe(2);
  });

  it('lists snapshots and incomplete directories', async () => {
    expect(await run(['list', 'acme/widgets'])).toBe(0);
    expect(out[0]).toBe('20240101-000000  (failed: releases)\nIncomplete (not restorable): 20231231-000000');
  });

  it('prints JSON when asked', async () => {
    await run(['list', '--json']);
    expect(JSON.parse(out[0])).toEqual([
      { repository: { owner: 'acme', name: 'widgets' }, snapshotCount: 1, latest: '20240101-000000' },
    ]);
  });

  it('shows the rate limit', async () => {
    await run(['rate-limit']);
    expect(out).toEqual(['12/5000 requests left, resets 2024-01-01T01:00:00.000Z']);
  });

  it('exits 3 on unexpected failures', async () => {
    const code = await run(['resume', 'acme/widgets', '20240101-000000'], {
      resume: async () => {
        throw new TypeError('boom');
      },
    });

    expect(code).toBe(3);
    expect(err).toEqual(['Unexpected error: boom']);
  });

  it('treats help as success and unknown commands as invalid input', async () => {
    expect(await run(['--help'])).toBe(0);
    expect(out.join('\n')).toContain('backup-all');
    expect(await run(['frobnicate'])).toBe(1);
  });
});

describe('exit codes', () => {
  it.each([
    [{ committed: 3, partial: 0, aborted: 0, skipped: 0, rejected: 0 }, 0],
    [{ committed: 2, partial: 1, aborted: 0, skipped: 0, rejected: 0 }, 2],
    [{ committed: 2, partial: 0, aborted: 0, skipped: 0, rejected: 1 }, 2],
    [{ committed: 0, partial: 0, aborted: 2, skipped: 0, rejected: 0 }, 3],
    [{ committed: 1, partial: 0, aborted: 0, skipped: 3, rejected: 0 }, 3],
    [{ committed: 0, partial: 0, aborted: 0, skipped: 0, rejected: 0 }, 0],
  ])('batch %j exits %i', (counts, code) => {
    expect(exitCodeForBatch(batchResult(counts))).toBe(code);
  });

  it('separates caller errors from failures', () => {
    expect(exitCodeForError(new SnapshotNotFoundError('x'))).toBe(1);
    expect(exitCodeForError(new NetworkError('x'))).toBe(3);
    expect(exitCodeForError(new Error('x'))).toBe(3);
  });
});
