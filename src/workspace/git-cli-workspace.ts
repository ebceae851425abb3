import { promises as fs } from 'node:fs';
import path from 'node:path';
import { Logger } from '@nestjs/common';

import {
  AuthError,
  errorMessage,
  NetworkError,
  RepositoryGoneError,
  WorkspaceError,
} from '../common/errors.js';
import { execGit, GitCommandFailure, type GitRunner } from './git-runner.js';
import type {
  CloneFromMirrorOptions,
  GitRef,
  VersionControlWorkspace,
} from './version-control-workspace.interface.js';

const AUTH_PATTERNS = [
  /authentication failed/i,
  /could not read username/i,
  /terminal prompts disabled/i,
  /permission denied/i,
  /returned error: 40[13]/i,
];

const GONE_PATTERNS = [
  /repository not found/i,
  /repository '[^']*' not found/i,
  /returned error: 404/i,
  /does not appear to be a git repository/i,
];

const NETWORK_PATTERNS = [
  /could not resolve host/i,
  /connection (timed out|refused|reset)/i,
  /operation timed out/i,
  /early eof/i,
  /rpc failed/i,
  /unexpected disconnect/i,
  /returned error: 5\d\d/i,
  /returned error: 429/i,
];

/** Map a failed git invocation onto the error taxonomy. */
export function mapGitError(error: unknown, operation: string): Error {
  const stderr = error instanceof GitCommandFailure ? error.stderr : errorMessage(error);
  const message = `${operation}: ${stderr.trim()}`;

  if (AUTH_PATTERNS.some((re) => re.test(stderr))) {
    return new AuthError(message, { cause: error });
  }
  if (GONE_PATTERNS.some((re) => re.test(stderr))) {
    return new RepositoryGoneError(message, { cause: error });
  }
  if (NETWORK_PATTERNS.some((re) => re.test(stderr))) {
    return new NetworkError(message, { cause: error });
  }
  return new WorkspaceError(message, { cause: error });
}

export interface GitCliWorkspaceOptions {
  token: string | null;
  runner?: GitRunner;
}

/**
 * VersionControlWorkspace on top of the `git` binary. The token travels in
 * GIT_CONFIG_* variables as an extra HTTP header and never appears in argv.
 */
export class GitCliWorkspace implements VersionControlWorkspace {
  private readonly logger = new Logger(GitCliWorkspace.name);
  private readonly run: GitRunner;

  constructor(private readonly options: GitCliWorkspaceOptions) {
    this.run = options.runner ?? execGit;
  }

  private remoteEnv(): NodeJS.ProcessEnv {
    const env: NodeJS.ProcessEnv = { ...process.env, GIT_TERMINAL_PROMPT: '0' };
    if (this.options.token) {
      const basic = Buffer.from(`x-access-token:${this.options.token}`).toString('base64');
      env.GIT_CONFIG_COUNT = '1';
      env.GIT_CONFIG_KEY_0 = 'http.extraHeader';
      env.GIT_CONFIG_VALUE_0 = `Authorization: basic ${basic}`;
    }
    return env;
  }

  private async git(args: string[], operation: string, cwd?: string, env?: NodeJS.ProcessEnv): Promise<string> {
    try {
      const { stdout } = await this.run(args, { cwd, env });
      return stdout;
    } catch (error: unknown) {
      throw mapGitError(error, operation);
    }
  }

  async mirrorClone(url: string, dest: string): Promise<void> {
    this.logger.debug(`🪞 git clone --mirror ${url}`);
    await fs.mkdir(path.dirname(dest), { recursive: true });
    await this.git(['clone', '--mirror', '--quiet', url, dest], `mirror clone of ${url}`, undefined, this.remoteEnv());
  }

  async cloneFromMirror(mirrorPath: string, dest: string, options: CloneFromMirrorOptions): Promise<void> {
    await fs.mkdir(dest, { recursive: true });
    await this.git(['init', '--quiet'], 'init', dest);
    // Fetch straight from the path so no remote-tracking refs get created
    await this.git(
      ['fetch', '--quiet', '--update-head-ok', mirrorPath, '+refs/*:refs/*'],
      `fetch from ${mirrorPath}`,
      dest,
    );

    const branch = options.branch ?? (await this.mirrorHead(mirrorPath));
    if (branch) {
      await this.git(['symbolic-ref', 'HEAD', `refs/heads/${branch}`], 'set HEAD', dest);
      await this.git(['reset', '--hard', '--quiet'], `checkout ${branch}`, dest);
    }
    await this.git(['remote', 'add', 'origin', options.remoteUrl ?? mirrorPath], 'add origin', dest);
  }

  private async mirrorHead(mirrorPath: string): Promise<string | null> {
    try {
      const out = await this.git(['symbolic-ref', '--short', 'HEAD'], 'read mirror HEAD', mirrorPath);
      return out.trim() || null;
    } catch (error: unknown) {
      this.logger.warn(`⚠️ Mirror HEAD unreadable, leaving target unchecked-out: ${errorMessage(error)}`);
      return null;
    }
  }

  async isRepository(dir: string): Promise<boolean> {
    try {
      await fs.stat(path.join(dir, '.git'));
      return true;
    } catch {
      return false;
    }
  }

  async isDirty(dir: string): Promise<boolean> {
    const out = await this.git(['status', '--porcelain'], 'status', dir);
    return out.trim().length > 0;
  }

  async activeBranch(dir: string): Promise<string> {
    // symbolic-ref also names an unborn branch, as in an empty repository
    const out = await this.git(['symbolic-ref', '--short', 'HEAD'], 'read HEAD', dir);
    return out.trim();
  }

  async listRefs(dir: string): Promise<GitRef[]> {
    const out = await this.git(['for-each-ref', '--format=%(objectname) %(refname)'], 'for-each-ref', dir);
    return out
      .split('\n')
      .map((line) => line.trim())
      .filter(Boolean)
      .map((line) => {
        const [objectId, name] = line.split(' ');
        return { objectId: objectId ?? '', name: name ?? '' };
      });
  }
}
