import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { errorMessage, systemErrorCode } from '../common/errors.js';

const execFileAsync = promisify(execFile);

export interface GitResult {
  stdout: string;
  stderr: string;
}

export interface GitRunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export type GitRunner = (args: string[], options: GitRunOptions) => Promise<GitResult>;

/** A git invocation that exited non-zero or could not be started. */
export class GitCommandFailure extends Error {
  constructor(
    readonly args: string[],
    readonly stderr: string,
    readonly exitCode: number | string | null,
    options?: { cause?: unknown },
  ) {
    super(`git ${args[0] ?? ''} failed: ${stderr.trim() || 'no output'}`, options);
    this.name = 'GitCommandFailure';
  }
}

function stderrOf(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'stderr' in error && typeof error.stderr === 'string' && error.stderr) {
    return error.stderr;
  }
  return errorMessage(error);
}


export const execGit: GitRunner = async (args, options) => {
  try {
    const { stdout, stderr } = await execFileAsync('git', args, {
      cwd: options.cwd,
      env: options.env,
      maxBuffer: 64 * 1024 * 1024,
    });
    return { stdout, stderr };
  } catch (error: unknown) {
    throw new GitCommandFailure(args, stderrOf(error), systemErrorCode(error), { cause: error });
  }
};
