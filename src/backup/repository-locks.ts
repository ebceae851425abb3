import { ConcurrentBackupError } from '../common/errors.js';
import { qualifiedName, type RepositoryRef } from '../common/repository-ref.js';

/** In-process single-writer guard: one running backup per repository. */
export class RepositoryLocks {
  private readonly held = new Set<string>();

  acquire(ref: RepositoryRef): () => void {
    const key = qualifiedName(ref).toLowerCase();
    if (this.held.has(key)) {
      throw new ConcurrentBackupError(`A backup of ${qualifiedName(ref)} is already running`);
    }
    this.held.add(key);
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.held.delete(key);
    };
  }

  isHeld(ref: RepositoryRef): boolean {
    return this.held.has(qualifiedName(ref).toLowerCase());
  }
}
