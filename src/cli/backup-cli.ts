import { Command, CommanderError, InvalidArgumentError } from 'commander';

import type { BackupService } from '../backup/backup.service.js';
import { type EntityClass, isEntityClass } from '../backup/backup.types.js';
import {
  formatBackupResult,
  formatBatchResult,
  formatManifest,
  formatRepositoryList,
  formatRestoreReport,
  formatSnapshotList,
} from '../backup/report-format.js';
import type { TransitionEvent } from '../backup/snapshot-coordinator.js';
import { errorMessage, isBackupError, SnapshotNotFoundError } from '../common/errors.js';
import { parseRepositoryRef } from '../common/repository-ref.js';
import type { RepositoryProvider } from '../github/repository-provider.interface.js';
import {
  EXIT_CODES,
  exitCodeForBackup,
  exitCodeForBatch,
  exitCodeForError,
  exitCodeForRestore,
  type ExitCode,
} from './exit-codes.js';

export type CliBackupService = Pick<
  BackupService,
  'backup' | 'backupAll' | 'resume' | 'restore' | 'listRepositories' | 'listSnapshots' | 'getSnapshot' | 'snapshotId'
>;

export interface CliDeps {
  service: CliBackupService;
  provider: Pick<RepositoryProvider, 'getRateLimit'>;
  out: (text: string) => void;
  err: (text: string) => void;
  signal?: AbortSignal; // cancels batch runs (SIGINT)
}

interface JsonOption {
  json?: boolean;
}

interface BackupCommandOptions extends JsonOption {
  metadata: boolean;
  only?: EntityClass[];
}

interface RestoreCommandOptions extends JsonOption {
  overwrite?: boolean;
  content: boolean;
  metadata?: boolean;
  dryRun?: boolean;
  into?: string;
}

function parseEntityClasses(value: string): EntityClass[] {
  const classes: EntityClass[] = [];
  for (const part of value.split(',').map((s) => s.trim()).filter(Boolean)) {
    if (!isEntityClass(part)) {
      throw new InvalidArgumentError(`Unknown entity class "${part}" (repository, issues, pull_requests, releases)`);
    }
    classes.push(part);
  }
  return classes;
}

/**
 * Commands for the backup engine. Every action sets the exit code it reports
 * through the returned holder; nothing here calls process.exit.
 */
export function buildProgram(deps: CliDeps, exit: { code: ExitCode }): Command {
  const { service, out, err } = deps;
  const print = (json: boolean | undefined, value: unknown, text: string) =>
    out(json ? JSON.stringify(value, null, 2) : text);
  const progress = (event: TransitionEvent) => err(`  ${event.from} -> ${event.to}`);

  const program = new Command();
  program
    .name('repo-vault')
    .description('Crash-safe backup and restore of GitHub repositories')
    .version('1.0.0')
    .exitOverride()
    .configureOutput({ writeOut: (s) => out(s.trimEnd()), writeErr: (s) => err(s.trimEnd()) });

  program
    .command('backup')
    .description('Snapshot one repository: mirror clone plus metadata')
    .argument('<repository>', 'owner/name')
    .option('--no-metadata', 'content mirror only')
    .option('--only <classes>', 'comma-separated metadata classes', parseEntityClasses)
    .option('--json', 'print the result as JSON')
    .action(async (repository: string, options: BackupCommandOptions) => {
      const result = await service.backup(parseRepositoryRef(repository), {
        includeMetadata: options.metadata,
        entityClasses: options.only,
        signal: deps.signal,
        onTransition: options.json ? undefined : progress,
      });
      print(options.json, result, formatBackupResult(result));
      exit.code = exitCodeForBackup(result);
    });

  program
    .command('backup-all')
    .description('Snapshot every repository of a user or organisation (default: yourself)')
    .argument('[owner]', 'user or organisation')
    .option('--no-metadata', 'content mirrors only')
    .option('--json', 'print the result as JSON')
    .action(async (owner: string | undefined, options: { metadata: boolean } & JsonOption) => {
      const result = await service.backupAll(owner, {
        includeMetadata: options.metadata,
        signal: deps.signal,
        onResult: options.json ? undefined : (entry) => err(`  ${entry.status} ${entry.repository}`),
      });
      print(options.json, result, formatBatchResult(result));
      exit.code = exitCodeForBatch(result);
    });

  program
    .command('list')
    .description('List repositories with backups, or the snapshots of one repository')
    .argument('[repository]', 'owner/name')
    .option('--json', 'print the result as JSON')
    .action(async (repository: string | undefined, options: JsonOption) => {
      if (!repository) {
        const summaries = await service.listRepositories();
        print(options.json, summaries, formatRepositoryList(summaries));
        return;
      }
      const listing = await service.listSnapshots(parseRepositoryRef(repository));
      const text = formatSnapshotList(listing.snapshots) +
        (listing.incomplete.length ? `\nIncomplete (not restorable): ${listing.incomplete.join(', ')}` : '');
      print(options.json, listing, text);
    });

  program
    .command('show')
    .description('Show the manifest of one snapshot')
    .argument('<repository>', 'owner/name')
    .argument('<timestamp>', 'snapshot timestamp, e.g. 20240101-000000')
    .option('--json', 'print the result as JSON')
    .action(async (repository: string, timestamp: string, options: JsonOption) => {
      const ref = parseRepositoryRef(repository);
      const detail = await service.getSnapshot(service.snapshotId(ref.owner, ref.name, timestamp));
      if (!detail) throw new SnapshotNotFoundError(`No committed snapshot ${repository}@${timestamp}`);
      print(options.json, detail, formatManifest(detail.manifest, detail.sizeBytes));
    });

  program
    .command('restore')
    .description('Restore a snapshot into a local working copy')
    .argument('<repository>', 'owner/name')
    .argument('<timestamp>', 'snapshot timestamp')
    .argument('<target>', 'directory, relative to WORKSPACE_DIR unless absolute')
    .option('--overwrite', 'replace a non-empty target (refused when it has uncommitted changes)')
    .option('--no-content', 'skip the working copy')
    .option('--metadata', 'replay labels, issues and releases into the remote repository')
    .option('--dry-run', 'report what would happen without changing anything')
    .option('--into <repository>', 'replay metadata into another owner/name')
    .option('--json', 'print the report as JSON')
    .action(async (repository: string, timestamp: string, target: string, options: RestoreCommandOptions) => {
      const ref = parseRepositoryRef(repository);
      const report = await service.restore(service.snapshotId(ref.owner, ref.name, timestamp), {
        target,
        overwrite: options.overwrite,
        content: options.content,
        metadata: options.metadata,
        dryRun: options.dryRun,
        intoRepository: options.into,
      });
      print(options.json, report, formatRestoreReport(report));
      exit.code = exitCodeForRestore(report);
    });

  program
    .command('resume')
    .description('Re-run an interrupted snapshot that has no committed manifest')
    .argument('<repository>', 'owner/name')
    .argument('<timestamp>', 'snapshot timestamp')
    .option('--json', 'print the result as JSON')
    .action(async (repository: string, timestamp: string, options: JsonOption) => {
      const ref = parseRepositoryRef(repository);
      const result = await service.resume(service.snapshotId(ref.owner, ref.name, timestamp), {
        onTransition: options.json ? undefined : progress,
      });
      print(options.json, result, formatBackupResult(result));
      exit.code = exitCodeForBackup(result);
    });

  program
    .command('rate-limit')
    .description('Show the remaining GitHub API quota')
    .option('--json', 'print the result as JSON')
    .action(async (options: JsonOption) => {
      const limit = await deps.provider.getRateLimit();
      print(options.json, limit, `${limit.remaining}/${limit.limit} requests left, resets ${limit.resetAt}`);
    });

  return program;
}

/** Parse and run `argv` (node-style, program name included); resolves to the exit code. */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<ExitCode> {
  const exit: { code: ExitCode } = { code: EXIT_CODES.OK };
  const program = buildProgram(deps, exit);
  try {
    await program.parseAsync([...argv]);
    return exit.code;
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_CODES.OK : EXIT_CODES.INVALID_INPUT;
    }
    deps.err(isBackupError(error) ? `${error.code}: ${error.message}` : `Unexpected error: ${errorMessage(error)}`);
    return exitCodeForError(error);
  }
}
