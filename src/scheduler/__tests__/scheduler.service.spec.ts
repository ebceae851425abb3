import { jest } from '@jest/globals';
import { promises as fs } from 'node:fs';
import path from 'node:path';

import { BackupService } from '../../backup/backup.service.js';
import { buildEngine, FakeProvider, FakeWorkspace, makeTempDir, SOURCE_REFS } from '../../backup/__tests__/fakes.js';
import { AuthError } from '../../common/errors.js';
import { loadAppConfig } from '../../config/app-config.js';
import { SchedulerService } from '../scheduler.service.js';

describe('SchedulerService', () => {
  let tmp: string;
  let provider: FakeProvider;
  let backups: BackupService;

  beforeEach(async () => {
    tmp = await makeTempDir();
    provider = new FakeProvider();
    const workspace = new FakeWorkspace();
    provider.addRepo('acme', 'widgets');
    workspace.addSource('https://github.test/acme/widgets.git', SOURCE_REFS);
    const engine = buildEngine(path.join(tmp, 'backups'), provider, workspace);
    backups = new BackupService(engine.coordinator, engine.catalog, engine.restore);
  });

  afterEach(async () => {
    await fs.rm(tmp, { recursive: true, force: true });
  });

  it('does nothing without a configured owner', async () => {
    const backupAll = jest.spyOn(backups, 'backupAll');
    const scheduler = new SchedulerService(backups, loadAppConfig({}));

    expect(await scheduler.handleDailyBackup()).toBeNull();
    expect(backupAll).not.toHaveBeenCalled();
  });

  it('backs up every repository of the configured owner', async () => {
    const backupAll = jest.spyOn(backups, 'backupAll');
    const scheduler = new SchedulerService(backups, loadAppConfig({ BACKUP_SCHEDULE_OWNER: 'acme' }));

    const result = await scheduler.handleDailyBackup();

    expect(backupAll).toHaveBeenCalledWith('acme');
    expect(result?.owner).toBe('acme');
    expect(result?.counts.committed).toBe(1);
  });

  it('skips a run while the previous one is still going', async () => {
    const scheduler = new SchedulerService(backups, loadAppConfig({ BACKUP_SCHEDULE_OWNER: 'acme' }));

    const [first, second] = await Promise.all([scheduler.handleDailyBackup(), scheduler.handleDailyBackup()]);

    expect(first?.counts.committed).toBe(1);
    expect(second).toBeNull();
  });

  it('logs and swallows a failed run so the next one still fires', async () => {
    provider.fail('listRepositories', () => new AuthError('Bad credentials'));
    const scheduler = new SchedulerService(backups, loadAppConfig({ BACKUP_SCHEDULE_OWNER: 'acme' }));

    expect(await scheduler.handleDailyBackup()).toBeNull();
  });
});
