import { Octokit } from '@octokit/rest';
import { RequestError } from '@octokit/request-error';
import { z } from 'zod';
import type {
  CollectionResult,
  Config,
  DateWindow,
  ProgressLogger,
  PullRequestRecord,
  PullRequestState,
  RateLimitStatus,
} from './types.js';
import {
  AuthError,
  EmptyOrgError,
  GitHubApiError,
  NetworkError,
  PrStatsError,
  RateLimitError,
} from './errors.js';
import { formatWindow, isWithinWindow } from './utils.js';

const PER_PAGE = 100;

// GitHub shows PRs from deleted accounts as authored by this placeholder user
export const GHOST_USER = 'ghost';

const repositorySchema = z.object({
  name: z.string(),
});

const pullRequestSchema = z.object({
  id: z.number(),
  number: z.number(),
  user: z.object({ login: z.string() }).nullable(),
  state: z.enum(['open', 'closed']),
  created_at: z.string().datetime({ offset: true }),
  merged_at: z.string().nullable(),
});

/**
 * Validate a raw pull request from the REST API and turn it into a record
 */
export function toPullRequestRecord(repository: string, raw: unknown): PullRequestRecord {
  const pr = pullRequestSchema.parse(raw);

  let state: PullRequestState = 'open';
  if (pr.state === 'closed') {
    state = pr.merged_at ? 'merged' : 'closed';
  }

  return Object.freeze({
    id: pr.id,
    number: pr.number,
    author: pr.user?.login ?? GHOST_USER,
    repository,
    createdAt: new Date(pr.created_at),
    state,
  });
}

function rateLimitReset(headers: Record<string, string | number | undefined>): Date | null {
  const resetSeconds = Number(headers['x-ratelimit-reset']);
  if (headers['x-ratelimit-reset'] !== undefined && Number.isFinite(resetSeconds)) {
    return new Date(resetSeconds * 1000);
  }

  // Secondary limits only say how long to wait
  const retryAfter = Number(headers['retry-after']);
  if (headers['retry-after'] !== undefined && Number.isFinite(retryAfter)) {
    return new Date(Date.now() + retryAfter * 1000);
  }
  return null;
}

/**
 * Map anything thrown by Octokit or the response schemas onto the error taxonomy
 */
export function toGitHubError(error: unknown, context: string): Error {
  if (error instanceof PrStatsError) return error;

  if (error instanceof z.ZodError) {
    const issue = error.issues[0];
    const detail = issue ? `${issue.path.join('.')}: ${issue.message}` : error.message;
    return new GitHubApiError(`${context}: unexpected response from GitHub (${detail})`, null, {
      cause: error,
    });
  }

  if (error instanceof RequestError) {
    if (!error.response) {
      return new NetworkError(`${context}: ${error.message}`, { cause: error });
    }

    const headers = error.response.headers;
    const quotaExhausted = String(headers['x-ratelimit-remaining']) === '0';
    const secondaryLimit = headers['retry-after'] !== undefined;
    if (error.status === 429 || (error.status === 403 && (quotaExhausted || secondaryLimit))) {
      return new RateLimitError(
        `${context}: GitHub API rate limit exceeded`,
        rateLimitReset(headers),
        { cause: error }
      );
    }

    if (error.status === 401 || error.status === 403) {
      return new AuthError(
        `${context}: GitHub rejected the token (${error.status} ${error.message})`,
        { cause: error }
      );
    }

    return new GitHubApiError(`${context}: ${error.status} ${error.message}`, error.status, {
      cause: error,
    });
  }

  return error instanceof Error ? error : new PrStatsError(`${context}: ${String(error)}`);
}

export class GitHubClient {
  private octokit: Octokit;
  private organization: string;

  constructor(
    config: Pick<Config, 'githubToken' | 'organization'>,
    octokit: Octokit = new Octokit({ auth: config.githubToken })
  ) {
    this.octokit = octokit;
    this.organization = config.organization;
  }

  /**
   * Current core API quota
   */
  async getRateLimit(): Promise<RateLimitStatus> {
    try {
      const { data } = await this.octokit.rateLimit.get();
      const core = data.resources.core;
      return {
        limit: core.limit,
        remaining: core.remaining,
        resetAt: new Date(core.reset * 1000),
      };
    } catch (error) {
      throw toGitHubError(error, 'Checking rate limit');
    }
  }

  /**
   * List every repository in the organization, private ones included
   */
  async listRepositories(): Promise<string[]> {
    let names: string[];

    try {
      names = await this.octokit.paginate(
        this.octokit.repos.listForOrg,
        {
          org: this.organization,
          type: 'all',
          per_page: PER_PAGE,
        },
        response => response.data.map(repo => repositorySchema.parse(repo).name)
      );
    } catch (error) {
      throw toGitHubError(error, `Listing repositories for ${this.organization}`);
    }

    if (names.length === 0) {
      throw new EmptyOrgError(this.organization);
    }
    return names;
  }

  /**
   * Fetch pull requests for a repository created within the window.
   * Results come newest first, so paging stops at the first page that
   * reaches back past the window start.
   */
  async fetchPullRequests(repo: string, window: DateWindow): Promise<PullRequestRecord[]> {
    try {
      return await this.octokit.paginate(
        this.octokit.pulls.list,
        {
          owner: this.organization,
          repo,
          state: 'all',
          sort: 'created',
          direction: 'desc',
          per_page: PER_PAGE,
        },
        (response, done) => {
          const page = response.data.map(pr => toPullRequestRecord(repo, pr));

          const oldest = page[page.length - 1];
          if (oldest && oldest.createdAt.getTime() < window.start.getTime()) {
            done();
          }

          return page.filter(pr => isWithinWindow(pr.createdAt, window));
        }
      );
    } catch (error) {
      throw toGitHubError(error, `Fetching pull requests for ${this.organization}/${repo}`);
    }
  }

  /**
   * Enumerate repositories, then collect their pull requests one repository at a time
   */
  async fetchAllPullRequests(
    window: DateWindow,
    log: ProgressLogger = () => {}
  ): Promise<CollectionResult> {
    log(`Fetching repositories for ${this.organization}...`);
    const repositories = await this.listRepositories();
    log(`✓ Found ${repositories.length} repositories`);
    log(`Fetching pull requests created ${formatWindow(window)}...\n`);

    const pullRequests: PullRequestRecord[] = [];

    for (const [index, repo] of repositories.entries()) {
      const prs = await this.fetchPullRequests(repo, window);
      pullRequests.push(...prs);
      log(`  [${index + 1}/${repositories.length}] ${repo}: ${prs.length} pull requests`);
    }

    return { repositories, pullRequests };
  }
}
