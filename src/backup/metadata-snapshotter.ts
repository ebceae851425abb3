import { Logger } from '@nestjs/common';
import { errorMessage } from '../common/errors.js';
import { qualifiedName, type RepositoryRef } from '../common/repository-ref.js';
import type {
  IssueRecord,
  ProviderPage,
  PullRequestRecord,
  RepoDescriptor,
  RepositoryProvider,
} from '../github/repository-provider.interface.js';
import type { EntityClass, MetadataArtifact, SkippedEntity } from './backup.types.js';
import type { Retrier } from './retrier.js';
import { runWithConcurrency } from './worker-pool.js';

const ENRICH_CONCURRENCY = 4;

export interface MetadataSnapshotterSettings {
  perPage: number;
  pullRequestDetails: boolean;
  includeIssueComments: boolean;
}

export interface MetadataSnapshotOptions {
  pageCap: number;
  prefetched?: RepoDescriptor; // reuse a descriptor fetched earlier in the run
}

interface PagedResult<T> {
  records: T[];
  truncated: boolean;
}

/**
 * Pulls one entity class from the provider into a MetadataArtifact. Records
 * keep the provider's order. Class-level failures are thrown; failures while
 * enriching a single record end up in `skipped`.
 */
export class MetadataSnapshotter {
  private readonly logger = new Logger(MetadataSnapshotter.name);

  constructor(
    private readonly provider: RepositoryProvider,
    private readonly retrier: Retrier,
    private readonly settings: MetadataSnapshotterSettings,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async snapshot(
    entityClass: EntityClass,
    ref: RepositoryRef,
    options: MetadataSnapshotOptions,
  ): Promise<MetadataArtifact> {
    const name = qualifiedName(ref);
    switch (entityClass) {
      case 'repository': {
        const descriptor =
          options.prefetched ??
          (await this.retrier.run(`Repository ${name}`, () => this.provider.getRepository(ref)));
        return this.artifact(entityClass, { records: [descriptor], truncated: false }, []);
      }
      case 'issues': {
        const paged = await this.paginate(`Issues ${name}`, options.pageCap, (page) =>
          this.provider.listIssues(ref, page, this.settings.perPage),
        );
        return this.settings.includeIssueComments
          ? this.withIssueComments(ref, paged)
          : this.artifact(entityClass, paged, []);
      }
      case 'pull_requests': {
        const paged = await this.paginate(`Pull requests ${name}`, options.pageCap, (page) =>
          this.provider.listPullRequests(ref, page, this.settings.perPage),
        );
        return this.settings.pullRequestDetails
          ? this.withPullRequestDetails(ref, paged)
          : this.artifact(entityClass, paged, []);
      }
      case 'releases': {
        const paged = await this.paginate(`Releases ${name}`, options.pageCap, (page) =>
          this.provider.listReleases(ref, page, this.settings.perPage),
        );
        return this.artifact(entityClass, paged, []);
      }
    }
  }

  private async paginate<T>(
    label: string,
    pageCap: number,
    fetchPage: (page: number) => Promise<ProviderPage<T>>,
  ): Promise<PagedResult<T>> {
    const records: T[] = [];
    for (let page = 1; ; page++) {
      const result = await this.retrier.run(`${label} page ${page}`, () => fetchPage(page));
      records.push(...result.items);
      if (!result.hasNext) return { records, truncated: false };
      if (page >= pageCap) {
        this.logger.warn(`✂️ ${label}: page cap ${pageCap} reached, snapshot truncated at ${records.length} records`);
        return { records, truncated: true };
      }
    }
  }

  private async withPullRequestDetails(
    ref: RepositoryRef,
    paged: PagedResult<PullRequestRecord>,
  ): Promise<MetadataArtifact<PullRequestRecord>> {
    const skipped: SkippedEntity[] = [];
    const outcomes = await runWithConcurrency(paged.records, ENRICH_CONCURRENCY, (pr) =>
      this.retrier.run(`PR detail ${qualifiedName(ref)}#${pr.number}`, () =>
        this.provider.getPullRequestDetail(ref, pr.number),
      ),
    );
    const records = paged.records.map((pr, i) => {
      const outcome = outcomes[i];
      if (outcome.status === 'fulfilled') return { ...pr, detail: outcome.value };
      skipped.push({ key: `#${pr.number}`, reason: reasonOf(outcome) });
      return pr;
    });
    return this.artifact('pull_requests', { records, truncated: paged.truncated }, skipped);
  }

  private async withIssueComments(
    ref: RepositoryRef,
    paged: PagedResult<IssueRecord>,
  ): Promise<MetadataArtifact<IssueRecord>> {
    const skipped: SkippedEntity[] = [];
    const withComments = paged.records.filter((issue) => issue.comments > 0);
    const outcomes = await runWithConcurrency(withComments, ENRICH_CONCURRENCY, (issue) =>
      this.retrier.run(`Comments ${qualifiedName(ref)}#${issue.number}`, () =>
        this.provider.listIssueComments(ref, issue.number),
      ),
    );
    const threads = new Map<number, (typeof outcomes)[number]>();
    withComments.forEach((issue, i) => threads.set(issue.number, outcomes[i]));

    const records = paged.records.map((issue) => {
      const outcome = threads.get(issue.number);
      if (!outcome) return issue;
      if (outcome.status === 'fulfilled') return { ...issue, commentThread: outcome.value };
      skipped.push({ key: `#${issue.number}`, reason: reasonOf(outcome) });
      return issue;
    });
    return this.artifact('issues', { records, truncated: paged.truncated }, skipped);
  }

  private artifact<T>(
    entityClass: EntityClass,
    paged: PagedResult<T>,
    skipped: SkippedEntity[],
  ): MetadataArtifact<T> {
    if (skipped.length > 0) {
      this.logger.warn(`⚠️ ${entityClass}: ${skipped.length} record(s) only partly captured`);
    }
    return {
      entityClass,
      fetchedCount: paged.records.length,
      totalCount: paged.truncated ? null : paged.records.length,
      truncated: paged.truncated,
      fetchedAt: this.clock().toISOString(),
      records: paged.records,
      skipped,
    };
  }
}

function reasonOf(outcome: { status: 'rejected'; reason: unknown } | { status: 'skipped' }): string {
  return outcome.status === 'rejected' ? errorMessage(outcome.reason) : 'not fetched';
}
