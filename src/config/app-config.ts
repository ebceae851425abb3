import os from 'node:os';
import path from 'node:path';
import { plainToInstance, Transform } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { ConfigurationError } from '../common/errors.js';

export const APP_CONFIG = 'APP_CONFIG';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface BackupSettings {
  concurrency: number;
  pageCap: number;
  perPage: number;
  retry: RetryPolicy;
  includeIssueComments: boolean;
  pullRequestDetails: boolean;
  scheduleOwner: string | null;
}

export interface HttpSettings {
  port: number;
  host: string;
  apiKey: string | null;
  nodeEnv: string;
}

export interface AppConfig {
  githubToken: string | null;
  githubUsername: string | null;
  githubOrg: string | null;
  githubApiUrl: string;
  cloneBaseUrl: string;
  rateLimitThreshold: number;
  workspaceDir: string;
  backupDir: string;
  backup: BackupSettings;
  http: HttpSettings;
}

const toBoolean = ({ value }: { value: unknown }): unknown => {
  if (typeof value !== 'string') return value;
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  return value;
};

const toInteger = ({ value }: { value: unknown }): unknown =>
  typeof value === 'string' && /^-?\d+$/.test(value.trim())
    ? Number(value.trim())
    : value;

// Raw environment, validated before it is turned into AppConfig
class EnvironmentVariables {
  @IsOptional() @IsString() GITHUB_TOKEN?: string;
  @IsOptional() @IsString() GITHUB_USERNAME?: string;
  @IsOptional() @IsString() GITHUB_ORG?: string;

  @IsUrl({ require_tld: false })
  GITHUB_API_URL: string = 'https://api.github.com';

  @IsUrl({ require_tld: false })
  GITHUB_CLONE_BASE_URL: string = 'https://github.com';

  @Transform(toInteger) @IsInt() @Min(0)
  RATE_LIMIT_THRESHOLD: number = 100;

  @IsString()
  WORKSPACE_DIR: string = path.join('~', 'workspace');

  @IsString()
  BACKUP_DIR: string = path.join('~', 'backups', 'github');

  @Transform(toInteger) @IsInt() @Min(1) @Max(32)
  BACKUP_CONCURRENCY: number = 3;

  @Transform(toInteger) @IsInt() @Min(1)
  BACKUP_PAGE_CAP: number = 50;

  @Transform(toInteger) @IsInt() @Min(1) @Max(100)
  BACKUP_PER_PAGE: number = 100;

  @Transform(toInteger) @IsInt() @Min(1) @Max(10)
  BACKUP_RETRY_ATTEMPTS: number = 4;

  @Transform(toInteger) @IsInt() @Min(0)
  BACKUP_RETRY_BASE_DELAY_MS: number = 1000;

  @Transform(toInteger) @IsInt() @Min(0)
  BACKUP_RETRY_MAX_DELAY_MS: number = 30_000;

  @Transform(toBoolean) @IsBoolean()
  BACKUP_INCLUDE_ISSUE_COMMENTS: boolean = false;

  @Transform(toBoolean) @IsBoolean()
  BACKUP_PULL_REQUEST_DETAILS: boolean = true;

  @IsOptional() @IsString() BACKUP_SCHEDULE_OWNER?: string;

  @Transform(toInteger) @IsInt() @Min(1) @Max(65535)
  PORT: number = 3000;

  @IsString()
  HOST: string = '127.0.0.1';

  @IsOptional() @IsString() API_KEY?: string;

  @IsIn(['development', 'production', 'test'])
  NODE_ENV: string = 'development';
}

const ENV_KEYS: ReadonlyArray<keyof EnvironmentVariables> = [
  'GITHUB_TOKEN',
  'GITHUB_USERNAME',
  'GITHUB_ORG',
  'GITHUB_API_URL',
  'GITHUB_CLONE_BASE_URL',
  'RATE_LIMIT_THRESHOLD',
  'WORKSPACE_DIR',
  'BACKUP_DIR',
  'BACKUP_CONCURRENCY',
  'BACKUP_PAGE_CAP',
  'BACKUP_PER_PAGE',
  'BACKUP_RETRY_ATTEMPTS',
  'BACKUP_RETRY_BASE_DELAY_MS',
  'BACKUP_RETRY_MAX_DELAY_MS',
  'BACKUP_INCLUDE_ISSUE_COMMENTS',
  'BACKUP_PULL_REQUEST_DETAILS',
  'BACKUP_SCHEDULE_OWNER',
  'PORT',
  'HOST',
  'API_KEY',
  'NODE_ENV',
];

function expandHome(dir: string): string {
  if (dir === '~') return os.homedir();
  if (dir.startsWith('~/') || dir.startsWith(`~${path.sep}`)) {
    return path.join(os.homedir(), dir.slice(2));
  }
  return path.resolve(dir);
}

/**
 * Build the application config from environment variables. Empty values count
 * as unset. Throws ConfigurationError listing every violation.
 */
export function loadAppConfig(
  env: Record<string, string | undefined>,
): AppConfig {
  const raw: Record<string, string> = {};
  for (const key of ENV_KEYS) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') raw[key] = value.trim();
  }

  const vars = plainToInstance(EnvironmentVariables, raw);
  const errors = validateSync(vars);
  if (errors.length > 0) {
    const details = errors
      .map((e) => `${e.property}: ${Object.values(e.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }

  return {
    githubToken: vars.GITHUB_TOKEN ?? null,
    githubUsername: vars.GITHUB_USERNAME ?? null,
    githubOrg: vars.GITHUB_ORG ?? null,
    githubApiUrl: vars.GITHUB_API_URL.replace(/\/+$/, ''),
    cloneBaseUrl: vars.GITHUB_CLONE_BASE_URL.replace(/\/+$/, ''),
    rateLimitThreshold: vars.RATE_LIMIT_THRESHOLD,
    workspaceDir: expandHome(vars.WORKSPACE_DIR),
    backupDir: expandHome(vars.BACKUP_DIR),
    backup: {
      concurrency: vars.BACKUP_CONCURRENCY,
      pageCap: vars.BACKUP_PAGE_CAP,
      perPage: vars.BACKUP_PER_PAGE,
      retry: {
        maxAttempts: vars.BACKUP_RETRY_ATTEMPTS,
        baseDelayMs: vars.BACKUP_RETRY_BASE_DELAY_MS,
        maxDelayMs: Math.max(
          vars.BACKUP_RETRY_MAX_DELAY_MS,
          vars.BACKUP_RETRY_BASE_DELAY_MS,
        ),
      },
      includeIssueComments: vars.BACKUP_INCLUDE_ISSUE_COMMENTS,
      pullRequestDetails: vars.BACKUP_PULL_REQUEST_DETAILS,
      scheduleOwner: vars.BACKUP_SCHEDULE_OWNER ?? null,
    },
    http: {
      port: vars.PORT,
      host: vars.HOST,
      apiKey: vars.API_KEY ?? null,
      nodeEnv: vars.NODE_ENV,
    },
  };
}

/** Config as shown to operators: secrets replaced by a presence flag. */
export function describeConfig(config: AppConfig) {
  return {
    github: {
      username: config.githubUsername,
      org: config.githubOrg,
      apiUrl: config.githubApiUrl,
      tokenConfigured: config.githubToken !== null,
      rateLimitThreshold: config.rateLimitThreshold,
    },
    workspaceDir: config.workspaceDir,
    backupDir: config.backupDir,
    backup: config.backup,
    http: {
      port: config.http.port,
      host: config.http.host,
      apiKeyConfigured: config.http.apiKey !== null,
      nodeEnv: config.http.nodeEnv,
    },
  };
}
