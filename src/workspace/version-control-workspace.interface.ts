// Local git operations the backup engine relies on.

export const VERSION_CONTROL_WORKSPACE = 'VERSION_CONTROL_WORKSPACE';

export interface GitRef {
  name: string; // e.g. refs/heads/main
  objectId: string;
}

export interface CloneFromMirrorOptions {
  branch: string | null; // null = the mirror's HEAD branch
  remoteUrl: string | null; // origin of the new working copy
}

export interface VersionControlWorkspace {
  /** Full mirror clone (all refs, all history) of `url` into `dest`. */
  mirrorClone(url: string, dest: string): Promise<void>;
  /** Working copy whose ref set equals the mirror's, checked out at `branch`. */
  cloneFromMirror(mirrorPath: string, dest: string, options: CloneFromMirrorOptions): Promise<void>;
  isRepository(dir: string): Promise<boolean>;
  isDirty(dir: string): Promise<boolean>;
  activeBranch(dir: string): Promise<string>;
  listRefs(dir: string): Promise<GitRef[]>;
}
