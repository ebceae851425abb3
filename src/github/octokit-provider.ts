import { Logger } from '@nestjs/common';
import { Octokit } from '@octokit/rest';
import type { RestEndpointMethodTypes } from '@octokit/rest';

import { ConfigurationError } from '../common/errors.js';
import type { RepositoryRef } from '../common/repository-ref.js';
import { mapProviderError } from './provider-errors.js';
import type {
  CommentRecord,
  CreatedIssue,
  CreatedRelease,
  CreateIssueInput,
  CreateReleaseInput,
  IssueRecord,
  LabelRecord,
  ProviderPage,
  PullRequestDetail,
  PullRequestRecord,
  RateLimitStatus,
  ReleaseRecord,
  RepoDescriptor,
  RepositoryProvider,
} from './repository-provider.interface.js';

// ---------- PAYLOAD TYPES ----------
type IssueItem =
  RestEndpointMethodTypes['issues']['listForRepo']['response']['data'][number];

type PullItem =
  RestEndpointMethodTypes['pulls']['list']['response']['data'][number];

type PullDetailPayload =
  RestEndpointMethodTypes['pulls']['get']['response']['data'];

type ReleaseItem =
  RestEndpointMethodTypes['repos']['listReleases']['response']['data'][number];

type CommentItem =
  RestEndpointMethodTypes['issues']['listComments']['response']['data'][number];

// Fields shared by the full, minimal and list repository payloads
interface RepoPayload {
  name: string;
  full_name: string;
  owner: { login: string };
  description: string | null;
  html_url: string;
  clone_url?: string;
  ssh_url?: string;
  default_branch?: string;
  private: boolean;
  archived?: boolean;
  fork: boolean;
  language?: string | null;
  size?: number;
  stargazers_count?: number;
  forks_count?: number;
  watchers_count?: number;
  open_issues_count?: number;
  topics?: string[];
  created_at?: string | null;
  updated_at?: string | null;
  pushed_at?: string | null;
}

type LabelPayload =
  | string
  | { name?: string; color?: string | null; description?: string | null };

export interface OctokitProviderOptions {
  token: string | null;
  username?: string | null;
  baseUrl?: string;
  userAgent?: string;
  fetch?: typeof fetch; // swap the transport, e.g. in tests
}

// ---------- MAPPERS ----------
function toRepoDescriptor(data: RepoPayload): RepoDescriptor {
  return {
    owner: data.owner.login,
    name: data.name,
    fullName: data.full_name,
    description: data.description ?? null,
    htmlUrl: data.html_url,
    cloneUrl: data.clone_url ?? null,
    sshUrl: data.ssh_url ?? null,
    defaultBranch: data.default_branch ?? null,
    private: data.private,
    archived: data.archived ?? false,
    fork: data.fork,
    language: data.language ?? null,
    sizeKb: data.size ?? null,
    stars: data.stargazers_count ?? 0,
    forks: data.forks_count ?? 0,
    watchers: data.watchers_count ?? 0,
    openIssues: data.open_issues_count ?? 0,
    topics: data.topics ?? [],
    createdAt: data.created_at ?? null,
    updatedAt: data.updated_at ?? null,
    pushedAt: data.pushed_at ?? null,
  };
}

function toLabel(label: LabelPayload): LabelRecord {
  if (typeof label === 'string') {
    return { name: label, color: null, description: null };
  }
  return {
    name: label.name ?? '',
    color: label.color ?? null,
    description: label.description ?? null,
  };
}

function toIssueRecord(it: IssueItem): IssueRecord {
  return {
    number: it.number,
    title: it.title,
    body: it.body ?? null,
    state: it.state === 'closed' ? 'closed' : 'open',
    user: it.user?.login ?? null,
    labels: it.labels.map(toLabel).filter((l) => l.name !== ''),
    assignees: (it.assignees ?? []).map((a) => a.login),
    comments: it.comments,
    createdAt: it.created_at ?? null,
    updatedAt: it.updated_at ?? null,
    closedAt: it.closed_at ?? null,
  };
}

function toPullRequestRecord(pr: PullItem): PullRequestRecord {
  return {
    number: pr.number,
    title: pr.title,
    body: pr.body ?? null,
    state: pr.state === 'closed' ? 'closed' : 'open',
    user: pr.user?.login ?? null,
    draft: pr.draft ?? false,
    head: pr.head.ref,
    base: pr.base.ref,
    labels: pr.labels.map((l) => l.name),
    createdAt: pr.created_at ?? null,
    updatedAt: pr.updated_at ?? null,
    closedAt: pr.closed_at ?? null,
    mergedAt: pr.merged_at ?? null,
  };
}

function toPullRequestDetail(data: PullDetailPayload): PullRequestDetail {
  return {
    merged: data.merged,
    mergeable: data.mergeable ?? null,
    commits: data.commits,
    comments: data.comments,
    reviewComments: data.review_comments,
    additions: data.additions,
    deletions: data.deletions,
    changedFiles: data.changed_files,
  };
}

function toReleaseRecord(r: ReleaseItem): ReleaseRecord {
  return {
    id: r.id,
    tagName: r.tag_name,
    name: r.name ?? null,
    body: r.body ?? null,
    draft: r.draft,
    prerelease: r.prerelease,
    targetCommitish: r.target_commitish,
    author: r.author?.login ?? null,
    createdAt: r.created_at ?? null,
    publishedAt: r.published_at ?? null,
    assets: r.assets.map((a) => ({
      name: a.name,
      size: a.size,
      downloadCount: a.download_count,
      url: a.browser_download_url,
    })),
  };
}

function toCommentRecord(c: CommentItem): CommentRecord {
  return {
    id: c.id,
    user: c.user?.login ?? null,
    body: c.body ?? null,
    createdAt: c.created_at ?? null,
    updatedAt: c.updated_at ?? null,
  };
}

export function hasNextPage(link: string | undefined): boolean {
  return /rel="next"/.test(link ?? '');
}

/**
 * RepositoryProvider backed by the GitHub REST API. The client is created on
 * first use so catalog-only commands work without a token.
 */
export class OctokitProvider implements RepositoryProvider {
  private readonly logger = new Logger(OctokitProvider.name);
  private client: Octokit | null = null;

  constructor(private readonly options: OctokitProviderOptions) {}

  private get octokit(): Octokit {
    if (!this.client) {
      if (!this.options.token) {
        throw new ConfigurationError('GITHUB_TOKEN environment variable is required');
      }
      this.client = new Octokit({
        auth: this.options.token,
        baseUrl: this.options.baseUrl,
        userAgent: this.options.userAgent ?? 'repo-vault/1.0',
        request: this.options.fetch ? { fetch: this.options.fetch } : undefined,
      });
    }
    return this.client;
  }

  private async call<T>(operation: string, fn: (octokit: Octokit) => Promise<T>): Promise<T> {
    try {
      return await fn(this.octokit);
    } catch (error: unknown) {
      throw mapProviderError(error, operation);
    }
  }

  // ---------- REPOS ----------
  async listRepositories(owner?: string): Promise<RepoDescriptor[]> {
    const username = this.options.username?.toLowerCase();
    const label = `listRepositories(${owner ?? 'authenticated user'})`;

    return this.call(label, async (octokit) => {
      if (!owner || owner.toLowerCase() === username) {
        const items = await octokit.paginate(
          octokit.repos.listForAuthenticatedUser,
          { affiliation: 'owner', per_page: 100 },
          (r) => r.data,
        );
        return items.map(toRepoDescriptor);
      }

      const { data: account } = await octokit.users.getByUsername({ username: owner });
      if (account.type === 'Organization') {
        const items = await octokit.paginate(
          octokit.repos.listForOrg,
          { org: owner, type: 'all', per_page: 100 },
          (r) => r.data,
        );
        return items.map(toRepoDescriptor);
      }

      const items = await octokit.paginate(
        octokit.repos.listForUser,
        { username: owner, type: 'owner', per_page: 100 },
        (r) => r.data,
      );
      return items.map(toRepoDescriptor);
    });
  }

  async getRepository(ref: RepositoryRef): Promise<RepoDescriptor> {
    this.logger.debug(`Fetching repo metadata: ${ref.owner}/${ref.name}`);
    return this.call(`repos.get(${ref.owner}/${ref.name})`, async (octokit) => {
      const { data } = await octokit.repos.get({ owner: ref.owner, repo: ref.name });
      return toRepoDescriptor(data);
    });
  }

  // ---------- ISSUES & PRs ----------
  async listIssues(ref: RepositoryRef, page: number, perPage: number): Promise<ProviderPage<IssueRecord>> {
    return this.call(`issues.listForRepo(${ref.owner}/${ref.name}, page ${page})`, async (octokit) => {
      const response = await octokit.issues.listForRepo({
        owner: ref.owner,
        repo: ref.name,
        state: 'all',
        per_page: perPage,
        page,
      });
      return {
        // the issues endpoint also returns pull requests
        items: response.data.filter((it) => !it.pull_request).map(toIssueRecord),
        hasNext: hasNextPage(response.headers.link),
      };
    });
  }

  async listIssueComments(ref: RepositoryRef, issueNumber: number): Promise<CommentRecord[]> {
    return this.call(`issues.listComments(${ref.owner}/${ref.name}#${issueNumber})`, async (octokit) => {
      const items = await octokit.paginate(
        octokit.issues.listComments,
        { owner: ref.owner, repo: ref.name, issue_number: issueNumber, per_page: 100 },
        (r) => r.data,
      );
      return items.map(toCommentRecord);
    });
  }

  async listPullRequests(ref: RepositoryRef, page: number, perPage: number): Promise<ProviderPage<PullRequestRecord>> {
    return this.call(`pulls.list(${ref.owner}/${ref.name}, page ${page})`, async (octokit) => {
      const response = await octokit.pulls.list({
        owner: ref.owner,
        repo: ref.name,
        state: 'all',
        per_page: perPage,
        page,
      });
      return {
        items: response.data.map(toPullRequestRecord),
        hasNext: hasNextPage(response.headers.link),
      };
    });
  }

  async getPullRequestDetail(ref: RepositoryRef, pullNumber: number): Promise<PullRequestDetail> {
    return this.call(`pulls.get(${ref.owner}/${ref.name}#${pullNumber})`, async (octokit) => {
      const { data } = await octokit.pulls.get({
        owner: ref.owner,
        repo: ref.name,
        pull_number: pullNumber,
      });
      return toPullRequestDetail(data);
    });
  }

  // ---------- RELEASES ----------
  async listReleases(ref: RepositoryRef, page: number, perPage: number): Promise<ProviderPage<ReleaseRecord>> {
    return this.call(`repos.listReleases(${ref.owner}/${ref.name}, page ${page})`, async (octokit) => {
      const response = await octokit.repos.listReleases({
        owner: ref.owner,
        repo: ref.name,
        per_page: perPage,
        page,
      });
      return {
        items: response.data.map(toReleaseRecord),
        hasNext: hasNextPage(response.headers.link),
      };
    });
  }

  async createRelease(ref: RepositoryRef, input: CreateReleaseInput): Promise<CreatedRelease> {
    return this.call(`repos.createRelease(${ref.owner}/${ref.name}, ${input.tagName})`, async (octokit) => {
      const { data } = await octokit.repos.createRelease({
        owner: ref.owner,
        repo: ref.name,
        tag_name: input.tagName,
        name: input.name ?? undefined,
        body: input.body ?? undefined,
        draft: input.draft,
        prerelease: input.prerelease,
        target_commitish: input.targetCommitish ?? undefined,
      });
      return { id: data.id, url: data.html_url };
    });
  }

  // ---------- LABELS ----------
  async listLabels(ref: RepositoryRef): Promise<LabelRecord[]> {
    return this.call(`issues.listLabelsForRepo(${ref.owner}/${ref.name})`, async (octokit) => {
      const items = await octokit.paginate(
        octokit.issues.listLabelsForRepo,
        { owner: ref.owner, repo: ref.name, per_page: 100 },
        (r) => r.data,
      );
      return items.map(toLabel);
    });
  }

  async createLabel(ref: RepositoryRef, label: LabelRecord): Promise<LabelRecord> {
    return this.call(`issues.createLabel(${ref.owner}/${ref.name}, ${label.name})`, async (octokit) => {
      const { data } = await octokit.issues.createLabel({
        owner: ref.owner,
        repo: ref.name,
        name: label.name,
        color: (label.color ?? 'ededed').replace(/^#/, ''),
        description: label.description ?? undefined,
      });
      return toLabel(data);
    });
  }

  // ---------- ISSUE WRITES ----------
  async createIssue(ref: RepositoryRef, input: CreateIssueInput): Promise<CreatedIssue> {
    return this.call(`issues.create(${ref.owner}/${ref.name})`, async (octokit) => {
      const { data } = await octokit.issues.create({
        owner: ref.owner,
        repo: ref.name,
        title: input.title,
        body: input.body ?? undefined,
        labels: input.labels,
      });
      return { number: data.number, url: data.html_url };
    });
  }

  async closeIssue(ref: RepositoryRef, issueNumber: number): Promise<void> {
    await this.call(`issues.update(${ref.owner}/${ref.name}#${issueNumber})`, async (octokit) => {
      await octokit.issues.update({
        owner: ref.owner,
        repo: ref.name,
        issue_number: issueNumber,
        state: 'closed',
      });
    });
  }

  // ---------- RATE LIMIT ----------
  async getRateLimit(): Promise<RateLimitStatus> {
    return this.call('rateLimit.get', async (octokit) => {
      const { data } = await octokit.rateLimit.get();
      const core = data.resources.core;
      return {
        limit: core.limit,
        remaining: core.remaining,
        resetAt: new Date(core.reset * 1000).toISOString(),
      };
    });
  }
}
