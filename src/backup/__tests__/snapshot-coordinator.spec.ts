import { promises as fs } from 'node:fs';
import path from 'node:path';

import {
  AuthError,
  ConcurrentBackupError,
  InvalidIdentifierError,
  SnapshotCommittedError,
  SnapshotNotFoundError,
  SourceUnavailableError,
} from '../../common/errors.js';
import { repositoryRef } from '../../common/repository-ref.js';
import { canTransition, type TransitionEvent } from '../snapshot-coordinator.js';
import { buildEngine, type Engine, FakeProvider, FakeWorkspace, issue, makeTempDir, release, SOURCE_REFS } from './fakes.js';

const REF = repositoryRef('acme', 'widgets');
const FULL_RUN = ['Created', 'ContentInFlight', 'MetadataInFlight', 'Finalizing', 'Committed'];

async function exists(file: string): Promise<boolean> {
  return fs
    .stat(file)
    .then(() => true)
    .catch(() => false);
}

describe('SnapshotCoordinator', () => {
  let tmp: string;
  let root: string;
  let provider: FakeProvider;
  let workspace: FakeWorkspace;
  let engine: Engine;

  const addRepo = (owner: string, name: string) => {
    provider.addRepo(owner, name, { issues: [issue(1), issue(2), issue(3)], releases: [release('v1.0.0')] });
    workspace.addSource(`https://github.test/${owner}/${name}.git`, SOURCE_REFS);
  };

  beforeEach(async () => {
    tmp = await makeTempDir();
    root = path.join(tmp, 'backups');
    provider = new FakeProvider();
    workspace = new FakeWorkspace();
    engine = buildEngine(root, provider, workspace);
    addRepo('acme', 'widgets');
  });

  afterEach(async () => {
    await fs.rm(tmp, { recursive: true, force: true });
  });

  describe('single repository', () => {
    it('commits a clean snapshot and lists it', async () => {
      const result = await engine.coordinator.backup(REF);

      expect(result.status).toBe('committed');
      expect(result.transitions).toEqual(FULL_RUN);
      expect(result.snapshotId.timestamp).toBe('20240101-000000');
      expect(result.manifest).toMatchObject({
        contentState: 'Complete',
        metadataState: { repository: 'Complete', issues: 'Complete', pull_requests: 'Complete', releases: 'Complete' },
        entityCounts: { repository: 1, issues: 3, pull_requests: 0, releases: 1 },
        refCount: 3,
        sourceDefaultBranch: 'main',
        sourceCloneUrl: 'https://github.test/acme/widgets.git',
        errors: [],
      });
      expect(await engine.catalog.list(REF)).toEqual([result.manifest]);
    });

    it('commits a partial snapshot when one metadata class is forbidden', async () => {
      provider.fail('listReleases', () => new AuthError('Resource not accessible (403)'));

      const result = await engine.coordinator.backup(REF);

      expect(result.status).toBe('partial');
      expect(result.state).toBe('Committed');
      expect(result.manifest?.contentState).toBe('Complete');
      expect(result.manifest?.metadataState).toEqual({
        repository: 'Complete',
        issues: 'Complete',
        pull_requests: 'Complete',
        releases: 'Failed',
      });
      expect(result.manifest?.errors).toEqual([
        { component: 'releases', code: 'AUTH_ERROR', message: 'Resource not accessible (403)' },
      ]);

      const layout = engine.paths.layout(result.snapshotId);
      expect(await exists(layout.metadata.issues)).toBe(true);
      expect(await exists(layout.metadata.releases)).toBe(false);

      const listed = await engine.catalog.list(REF);
      expect(listed.map((m) => m.snapshotId.timestamp)).toEqual(['20240101-000000']);
    });

    it('commits metadata when the content mirror fails', async () => {
      workspace.mirrorFailures.set('https://github.test/acme/widgets.git', () => new AuthError('Authentication failed'));

      const result = await engine.coordinator.backup(REF);

      expect(result.status).toBe('partial');
      expect(result.manifest?.contentState).toBe('Failed');
      expect(result.manifest?.refCount).toBeNull();
      expect(result.manifest?.errors).toEqual([
        { component: 'content', code: 'AUTH_ERROR', message: 'Authentication failed' },
      ]);
      expect(await exists(engine.paths.layout(result.snapshotId).content)).toBe(false);
    });

    it('leaves unrequested classes Skipped', async () => {
      const contentOnly = await engine.coordinator.backup(REF, { includeMetadata: false });
      expect(contentOnly.status).toBe('committed');
      expect(contentOnly.manifest?.metadataState).toEqual({
        repository: 'Skipped',
        issues: 'Skipped',
        pull_requests: 'Skipped',
        releases: 'Skipped',
      });
      expect(await exists(engine.paths.layout(contentOnly.snapshotId).metadataDir)).toBe(false);

      const issuesOnly = await engine.coordinator.backup(REF, { entityClasses: ['issues'] });
      expect(issuesOnly.snapshotId.timestamp).toBe('20240101-000000-1');
      expect(issuesOnly.manifest?.metadataState.issues).toBe('Complete');
      expect(issuesOnly.manifest?.metadataState.releases).toBe('Skipped');
      expect(provider.callCount('listReleases')).toBe(0);
    });

    it('commits a snapshot whose every part failed, with the reasons recorded', async () => {
      const ghost = repositoryRef('acme', 'ghost');

      const result = await engine.coordinator.backup(ghost);

      expect(result.status).toBe('partial');
      expect(result.error).toBeNull();
      expect(result.transitions).toEqual(['Created', 'ContentInFlight', 'MetadataInFlight', 'Finalizing', 'Committed']);
      expect(result.manifest?.contentState).toBe('Failed');
      expect(result.manifest?.metadataState).toEqual({
        repository: 'Failed',
        issues: 'Failed',
        pull_requests: 'Failed',
        releases: 'Failed',
      });
      expect(result.manifest?.errors.map((e) => e.component)).toEqual([
        'content',
        'repository',
        'issues',
        'pull_requests',
        'releases',
      ]);
      expect((await engine.catalog.list(ghost)).map((m) => m.snapshotId)).toEqual([result.snapshotId]);
    });

    it('rejects hostile repository names without creating anything', async () => {
      await expect(engine.coordinator.backup(repositoryRef('acme', '../../etc'))).rejects.toThrow(
        InvalidIdentifierError,
      );
      expect(await exists(root)).toBe(false);
    });

    it('refuses a second backup of the same repository while one runs', async () => {
      const first = engine.coordinator.backup(REF);
      await expect(engine.coordinator.backup(repositoryRef('ACME', 'Widgets'))).rejects.toThrow(ConcurrentBackupError);

      expect((await first).status).toBe('committed');
      expect(engine.locks.isHeld(REF)).toBe(false);
    });

    it('aborts before any work when already cancelled', async () => {
      const controller = new AbortController();
      controller.abort();

      const result = await engine.coordinator.backup(REF, { signal: controller.signal });

      expect(result.status).toBe('aborted');
      expect(result.transitions).toEqual(['Created', 'Aborted']);
      expect(workspace.mirrorCalls).toBe(0);
      expect(await fs.readdir(engine.paths.repositoryDir(REF))).toEqual([]);
    });

    it('aborts at the next transition when cancelled mid-run', async () => {
      const controller = new AbortController();
      const events: TransitionEvent[] = [];

      const result = await engine.coordinator.backup(REF, {
        signal: controller.signal,
        onTransition: (event) => {
          events.push(event);
          if (event.to === 'ContentInFlight') controller.abort();
        },
      });

      expect(result.transitions).toEqual(['Created', 'ContentInFlight', 'Aborted']);
      expect(events.map((e) => `${e.from}->${e.to}`)).toEqual(['Created->ContentInFlight', 'ContentInFlight->Aborted']);
      expect(await engine.catalog.list(REF)).toEqual([]);
    });
  });

  describe('resume', () => {
    const crashed = { repository: REF, timestamp: '20231231-120000' };

    it('completes a snapshot left behind by a crash', async () => {
      const layout = engine.paths.layout(crashed);
      await fs.mkdir(layout.content, { recursive: true });
      await fs.writeFile(path.join(layout.content, 'half-written.pack'), 'x');
      expect(await engine.catalog.listIncomplete(REF)).toEqual(['20231231-120000']);
      expect(await engine.catalog.list(REF)).toEqual([]);

      const result = await engine.coordinator.resume(crashed);

      expect(result.status).toBe('committed');
      expect(result.snapshotId).toEqual(crashed);
      expect(await exists(path.join(layout.content, 'half-written.pack'))).toBe(false);
      expect((await engine.catalog.list(REF)).map((m) => m.snapshotId.timestamp)).toEqual(['20231231-120000']);
      expect(await engine.catalog.listIncomplete(REF)).toEqual([]);
    });

    it('refuses to resume a committed snapshot', async () => {
      const { snapshotId } = await engine.coordinator.backup(REF);

      await expect(engine.coordinator.resume(snapshotId)).rejects.toThrow(SnapshotCommittedError);
    });

    it('reports a missing snapshot directory', async () => {
      await expect(engine.coordinator.resume(crashed)).rejects.toThrow(SnapshotNotFoundError);
    });
  });

  describe('backupAll', () => {
    beforeEach(() => {
      addRepo('acme', 'alpha');
      addRepo('acme', 'kilo');
      addRepo('acme', 'zulu');
    });

    it('isolates the failure of one repository', async () => {
      for (const method of ['getRepository', 'listIssues', 'listPullRequests', 'listReleases'] as const) {
        provider.fail(method, () => new SourceUnavailableError('gone'), { repository: 'acme/kilo' });
      }
      workspace.sources.delete('https://github.test/acme/kilo.git');

      const batch = await engine.coordinator.backupAll('acme');

      expect(batch.counts).toEqual({ committed: 3, partial: 1, aborted: 0, skipped: 0, rejected: 0 });
      expect(batch.results['acme/kilo']).toEqual({
        repository: 'acme/kilo',
        status: 'partial',
        timestamp: '20240101-000000',
        error: null,
      });
      expect(batch.results['acme/zulu']).toEqual({
        repository: 'acme/zulu',
        status: 'committed',
        timestamp: '20240101-000000',
        error: null,
      });
      expect((await engine.catalog.listRepositories()).map((s) => [s.repository.name, s.snapshotCount])).toEqual([
        ['alpha', 1],
        ['kilo', 1],
        ['widgets', 1],
        ['zulu', 1],
      ]);
    });

    it('rejects hostile names reported by the provider', async () => {
      provider.addRepo('acme', '..');

      const batch = await engine.coordinator.backupAll('acme');

      expect(batch.results['acme/..']).toMatchObject({ status: 'rejected', error: { code: 'INVALID_IDENTIFIER' } });
      expect(batch.counts.committed).toBe(4);
    });

    it('skips repositories not yet started once cancelled', async () => {
      const controller = new AbortController();
      const local = buildEngine(root, provider, workspace, { coordinator: { concurrency: 1 } });

      const batch = await local.coordinator.backupAll('acme', {
        signal: controller.signal,
        onResult: () => controller.abort(),
      });

      expect(batch.counts).toEqual({ committed: 1, partial: 0, aborted: 0, skipped: 3, rejected: 0 });
    });

    it('propagates a failure to list repositories', async () => {
      provider.fail('listRepositories', () => new AuthError('Bad credentials'));

      await expect(engine.coordinator.backupAll('acme')).rejects.toThrow(AuthError);
    });
  });
});

describe('canTransition', () => {
  it('only allows forward steps or abort', () => {
    expect(canTransition('Created', 'ContentInFlight')).toBe(true);
    expect(canTransition('Created', 'Finalizing')).toBe(false);
    expect(canTransition('Finalizing', 'Aborted')).toBe(true);
    expect(canTransition('Committed', 'Aborted')).toBe(false);
    expect(canTransition('Aborted', 'Created')).toBe(false);
  });
});
