import { InvalidIdentifierError } from './errors.js';

/** Immutable address of a remote repository and of its snapshot namespace. */
export interface RepositoryRef {
  readonly owner: string;
  readonly name: string;
}

export function repositoryRef(owner: string, name: string): RepositoryRef {
  return Object.freeze({ owner, name });
}

export function qualifiedName(ref: RepositoryRef): string {
  return `${ref.owner}/${ref.name}`;
}

export function sameRepository(a: RepositoryRef, b: RepositoryRef): boolean {
  return a.owner === b.owner && a.name === b.name;
}

/**
 * Parse "owner/name". Only the shape is checked here; path safety of each
 * segment is the path resolver's job.
 */
export function parseRepositoryRef(value: string): RepositoryRef {
  const trimmed = value.trim();
  const parts = trimmed.split('/');
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new InvalidIdentifierError(
      `Repository must be given as "owner/name", got "${value}"`,
    );
  }
  return repositoryRef(parts[0], parts[1]);
}
