import os from 'node:os';
import path from 'node:path';

import { ConfigurationError } from '../../common/errors.js';
import { describeConfig, loadAppConfig } from '../app-config.js';

describe('loadAppConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadAppConfig({});

    expect(config.githubToken).toBeNull();
    expect(config.githubApiUrl).toBe('https://api.github.com');
    expect(config.cloneBaseUrl).toBe('https://github.com');
    expect(config.backupDir).toBe(path.join(os.homedir(), 'backups', 'github'));
    expect(config.workspaceDir).toBe(path.join(os.homedir(), 'workspace'));
    expect(config.backup).toEqual({
      concurrency: 3,
      pageCap: 50,
      perPage: 100,
      retry: { maxAttempts: 4, baseDelayMs: 1000, maxDelayMs: 30_000 },
      includeIssueComments: false,
      pullRequestDetails: true,
      scheduleOwner: null,
    });
    expect(config.http).toEqual({ port: 3000, host: '127.0.0.1', apiKey: null, nodeEnv: 'development' });
  });

  it('parses numbers, booleans and urls and treats blank values as unset', () => {
    const config = loadAppConfig({
      GITHUB_TOKEN: '   ',
      GITHUB_API_URL: 'https://ghe.test/api/v3/',
      BACKUP_DIR: '/srv/backups',
      BACKUP_CONCURRENCY: '8',
      BACKUP_INCLUDE_ISSUE_COMMENTS: 'yes',
      BACKUP_PULL_REQUEST_DETAILS: 'off',
      BACKUP_SCHEDULE_OWNER: 'acme',
    });

    expect(config.githubToken).toBeNull();
    expect(config.githubApiUrl).toBe('https://ghe.test/api/v3');
    expect(config.backupDir).toBe(path.resolve('/srv/backups'));
    expect(config.backup.concurrency).toBe(8);
    expect(config.backup.includeIssueComments).toBe(true);
    expect(config.backup.pullRequestDetails).toBe(false);
    expect(config.backup.scheduleOwner).toBe('acme');
  });

  it('never lets the retry cap fall below the base delay', () => {
    const config = loadAppConfig({ BACKUP_RETRY_BASE_DELAY_MS: '5000', BACKUP_RETRY_MAX_DELAY_MS: '100' });
    expect(config.backup.retry.maxDelayMs).toBe(5000);
  });

  it('reports every invalid variable at once', () => {
    let caught: unknown;
    try {
      loadAppConfig({ BACKUP_CONCURRENCY: '0', PORT: 'http', NODE_ENV: 'staging' });
    } catch (error: unknown) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    const message = caught instanceof Error ? caught.message : '';
    expect(message).toContain('BACKUP_CONCURRENCY');
    expect(message).toContain('PORT');
    expect(message).toContain('NODE_ENV');
  });
});

describe('describeConfig', () => {
  it('reports secrets by presence only', () => {
    const described = describeConfig(loadAppConfig({ GITHUB_TOKEN: 'test-token', API_KEY: 'test-key' }));

    expect(described.github.tokenConfigured).toBe(true);
    expect(described.http.apiKeyConfigured).toBe(true);
    const text = JSON.stringify(described);
    expect(text.includes('test-token')).toBe(false);
    expect(text.includes('test-key')).toBe(false);
  });
});
