import { promises as fs } from 'node:fs';
import path from 'node:path';
import { Logger } from '@nestjs/common';

import { errorMessage, SnapshotCommittedError } from '../common/errors.js';
import { qualifiedName, type RepositoryRef } from '../common/repository-ref.js';
import type { VersionControlWorkspace } from '../workspace/version-control-workspace.interface.js';
import type { ContentMirror } from './backup.types.js';
import { readManifest } from './manifest.js';
import type { Retrier } from './retrier.js';

/**
 * Mirror-clones a repository into a snapshot's `content/` directory. Anything
 * already at the destination is garbage from an unfinished run and is wiped,
 * unless the snapshot has been committed.
 */
export class ContentSnapshotter {
  private readonly logger = new Logger(ContentSnapshotter.name);

  constructor(
    private readonly workspace: VersionControlWorkspace,
    private readonly retrier: Retrier,
  ) {}

  async mirrorClone(ref: RepositoryRef, cloneUrl: string, destPath: string): Promise<ContentMirror> {
    const name = qualifiedName(ref);
    const manifest = await readManifest(path.dirname(destPath));
    if (manifest) {
      throw new SnapshotCommittedError(`Snapshot content for ${name} is committed and cannot be rewritten`);
    }

    await fs.rm(destPath, { recursive: true, force: true });
    try {
      await this.retrier.run(
        `Mirror clone ${name}`,
        () => this.workspace.mirrorClone(cloneUrl, destPath),
        () => fs.rm(destPath, { recursive: true, force: true }),
      );
      const refs = await this.workspace.listRefs(destPath);
      this.logger.log(`📦 Mirrored ${name}: ${refs.length} refs`);
      return { path: destPath, refCount: refs.length };
    } catch (error: unknown) {
      this.logger.warn(`❌ Mirror clone of ${name} failed: ${errorMessage(error)}`);
      await fs.rm(destPath, { recursive: true, force: true });
      throw error;
    }
  }
}
