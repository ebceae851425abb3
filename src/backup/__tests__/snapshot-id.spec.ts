import { promises as fs } from 'node:fs';
import path from 'node:path';

import { InvalidIdentifierError } from '../../common/errors.js';
import { repositoryRef } from '../../common/repository-ref.js';
import { PathResolver } from '../path-resolver.js';
import { allocateSnapshotId, compareTimestamps, formatTimestamp, snapshotLabel } from '../snapshot-id.js';
import { makeTempDir } from './fakes.js';

describe('snapshot ids', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('formats UTC second-resolution stamps', () => {
    expect(formatTimestamp(new Date('2024-03-05T07:08:09.999Z'))).toBe('20240305-070809');
  });

  it('hands out distinct ids for allocations in the same second', async () => {
    const paths = new PathResolver(root);
    const ref = repositoryRef('acme', 'widgets');
    const now = new Date('2024-01-01T00:00:00Z');

    const ids = await Promise.all([1, 2, 3].map(() => allocateSnapshotId(paths, ref, now)));
    const timestamps = ids.map((id) => id.timestamp).sort(compareTimestamps);

    expect(timestamps).toEqual(['20240101-000000', '20240101-000000-1', '20240101-000000-2']);
    const dirs = await fs.readdir(path.join(root, 'acme', 'widgets'));
    expect(dirs.sort()).toEqual(['20240101-000000', '20240101-000000-1', '20240101-000000-2']);
  });

  it('orders counters numerically', () => {
    const stamps = ['20240101-000000-10', '20240101-000000-2', '20240101-000000', '20231231-235959'];
    expect([...stamps].sort(compareTimestamps)).toEqual([
      '20231231-235959',
      '20240101-000000',
      '20240101-000000-2',
      '20240101-000000-10',
    ]);
  });

  it('rejects hostile repository names before touching the disk', async () => {
    const paths = new PathResolver(root);
    await expect(allocateSnapshotId(paths, repositoryRef('..', 'widgets'), new Date())).rejects.toThrow(
      InvalidIdentifierError,
    );
    expect(await fs.readdir(root)).toEqual([]);
  });

  it('labels ids as owner/name@timestamp', () => {
    expect(snapshotLabel({ repository: repositoryRef('acme', 'widgets'), timestamp: '20240101-000000-1' })).toBe(
      'acme/widgets@20240101-000000-1',
    );
  });
});
