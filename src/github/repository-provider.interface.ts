// Abstraction over the remote repository host used by the backup engine.
// Implementations map every failure onto the errors in common/errors.ts.

import type { RepositoryRef } from '../common/repository-ref.js';

export const REPOSITORY_PROVIDER = 'REPOSITORY_PROVIDER';

export type ISO8601 = string; // e.g. "2024-01-01T00:00:00Z"

export interface ProviderPage<T> {
  items: T[];
  hasNext: boolean; // provider advertised a further page
}

export interface RepoDescriptor {
  owner: string;
  name: string;
  fullName: string; // owner/name
  description: string | null;
  htmlUrl: string;
  cloneUrl: string | null;
  sshUrl: string | null;
  defaultBranch: string | null;
  private: boolean;
  archived: boolean;
  fork: boolean;
  language: string | null;
  sizeKb: number | null;
  stars: number;
  forks: number;
  watchers: number;
  openIssues: number;
  topics: string[];
  createdAt: ISO8601 | null;
  updatedAt: ISO8601 | null;
  pushedAt: ISO8601 | null;
}

export interface LabelRecord {
  name: string;
  color: string | null; // hex without '#'
  description: string | null;
}

export interface CommentRecord {
  id: number;
  user: string | null;
  body: string | null;
  createdAt: ISO8601 | null;
  updatedAt: ISO8601 | null;
}

export interface IssueRecord {
  number: number;
  title: string;
  body: string | null;
  state: 'open' | 'closed';
  user: string | null;
  labels: LabelRecord[];
  assignees: string[];
  comments: number;
  createdAt: ISO8601 | null;
  updatedAt: ISO8601 | null;
  closedAt: ISO8601 | null;
  // Filled in when comment threads are backed up
  commentThread?: CommentRecord[];
}

export interface PullRequestDetail {
  merged: boolean;
  mergeable: boolean | null;
  commits: number;
  comments: number;
  reviewComments: number;
  additions: number;
  deletions: number;
  changedFiles: number;
}

export interface PullRequestRecord {
  number: number;
  title: string;
  body: string | null;
  state: 'open' | 'closed';
  user: string | null;
  draft: boolean;
  head: string;
  base: string;
  labels: string[];
  createdAt: ISO8601 | null;
  updatedAt: ISO8601 | null;
  closedAt: ISO8601 | null;
  mergedAt: ISO8601 | null;
  detail?: PullRequestDetail;
}

export interface ReleaseAsset {
  name: string;
  size: number;
  downloadCount: number;
  url: string;
}

export interface ReleaseRecord {
  id: number;
  tagName: string;
  name: string | null;
  body: string | null;
  draft: boolean;
  prerelease: boolean;
  targetCommitish: string;
  author: string | null;
  createdAt: ISO8601 | null;
  publishedAt: ISO8601 | null;
  assets: ReleaseAsset[];
}

export interface RateLimitStatus {
  limit: number;
  remaining: number;
  resetAt: ISO8601;
}

export interface CreateIssueInput {
  title: string;
  body: string | null;
  labels: string[];
}

export interface CreateReleaseInput {
  tagName: string;
  name: string | null;
  body: string | null;
  draft: boolean;
  prerelease: boolean;
  targetCommitish: string | null;
}

export interface CreatedIssue {
  number: number; // per-repository issue number, not the global id
  url: string | null;
}

export interface CreatedRelease {
  id: number;
  url: string | null;
}

// The interface consumed by the backup engine
export interface RepositoryProvider {
  // Repositories; owner may be a user or an organisation, omitted = authenticated user
  listRepositories(owner?: string): Promise<RepoDescriptor[]>;
  getRepository(ref: RepositoryRef): Promise<RepoDescriptor>;

  // Paged listings, in the provider's own order
  listIssues(ref: RepositoryRef, page: number, perPage: number): Promise<ProviderPage<IssueRecord>>;
  listPullRequests(ref: RepositoryRef, page: number, perPage: number): Promise<ProviderPage<PullRequestRecord>>;
  listReleases(ref: RepositoryRef, page: number, perPage: number): Promise<ProviderPage<ReleaseRecord>>;

  // Per-entity enrichment
  listIssueComments(ref: RepositoryRef, issueNumber: number): Promise<CommentRecord[]>;
  getPullRequestDetail(ref: RepositoryRef, pullNumber: number): Promise<PullRequestDetail>;

  // Replay
  listLabels(ref: RepositoryRef): Promise<LabelRecord[]>;
  createLabel(ref: RepositoryRef, label: LabelRecord): Promise<LabelRecord>;
  createIssue(ref: RepositoryRef, input: CreateIssueInput): Promise<CreatedIssue>;
  closeIssue(ref: RepositoryRef, issueNumber: number): Promise<void>;
  createRelease(ref: RepositoryRef, input: CreateReleaseInput): Promise<CreatedRelease>;

  getRateLimit(): Promise<RateLimitStatus>;
}
