/**
 * Read-only GitHub access for one evaluation. Constructed from explicit options;
 * every read is retried on TransientError and parsed into a validated snapshot.
 */

import { Octokit } from "@octokit/rest";
import type { RepoRef } from "../config/env.js";
import type { Logger } from "../log.js";
import { formatTeam, type TeamRef } from "../policy/types.js";
import { classifyRequestError } from "./errors.js";
import { parseCommits, parseMemberLogins, parsePullRequest, parseReviews } from "./parse.js";
import { withRetry, type RetryOptions } from "./retry.js";
import type { Commit, PullRequest, Review } from "./types.js";

const USER_AGENT = "approval-gate/1.0";
const PER_PAGE = 100;

export interface GitHubClientOptions {
  token: string;
  baseUrl?: string;
  userAgent?: string;
  logger?: Logger;
  retry?: Omit<RetryOptions, "signal" | "logger">;
  /** Aborts in-flight requests and stops further retries. */
  signal?: AbortSignal;
  /** Replaces the global fetch (in-process stand-ins). */
  fetch?: typeof globalThis.fetch;
}

export interface PlatformClient {
  fetchPullRequest(repo: RepoRef, number: number): Promise<PullRequest>;
  fetchReviews(repo: RepoRef, number: number): Promise<Review[]>;
  fetchCommits(repo: RepoRef, number: number): Promise<Commit[]>;
  listTeamMembers(team: TeamRef): Promise<string[]>;
}

export class GitHubClient implements PlatformClient {
  private readonly octokit: Octokit;
  private readonly retry: RetryOptions;

  constructor(opts: GitHubClientOptions) {
    const logger = opts.logger;
    this.octokit = new Octokit({
      auth: opts.token,
      baseUrl: opts.baseUrl,
      userAgent: opts.userAgent ?? USER_AGENT,
      log: {
        // request-log reports every request at info; keep that out of CI output
        debug: (m: string) => logger?.debug(m),
        info: (m: string) => logger?.debug(m),
        warn: (m: string) => logger?.warn(m),
        error: (m: string) => logger?.debug(m),
      },
      request: {
        fetch: opts.fetch,
        signal: opts.signal,
      },
    });
    this.retry = { ...opts.retry, signal: opts.signal, logger };
  }

  private async read<T>(resource: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(
      `read ${resource}`,
      async () => {
        try {
          return await fn();
        } catch (err) {
          throw classifyRequestError(err, resource);
        }
      },
      this.retry,
    );
  }

  async fetchPullRequest(repo: RepoRef, number: number): Promise<PullRequest> {
    const resource = `pull request ${repo.owner}/${repo.repo}#${number}`;
    return this.read(resource, async () => {
      const { data } = await this.octokit.pulls.get({
        owner: repo.owner,
        repo: repo.repo,
        pull_number: number,
      });
      return parsePullRequest(data);
    });
  }

  async fetchReviews(repo: RepoRef, number: number): Promise<Review[]> {
    const resource = `reviews of ${repo.owner}/${repo.repo}#${number}`;
    return this.read(resource, async () => {
      const data = await this.octokit.paginate(this.octokit.pulls.listReviews, {
        owner: repo.owner,
        repo: repo.repo,
        pull_number: number,
        per_page: PER_PAGE,
      });
      return parseReviews(data);
    });
  }

  async fetchCommits(repo: RepoRef, number: number): Promise<Commit[]> {
    const resource = `commits of ${repo.owner}/${repo.repo}#${number}`;
    return this.read(resource, async () => {
      const data = await this.octokit.paginate(this.octokit.pulls.listCommits, {
        owner: repo.owner,
        repo: repo.repo,
        pull_number: number,
        per_page: PER_PAGE,
      });
      return parseCommits(data);
    });
  }

  async listTeamMembers(team: TeamRef): Promise<string[]> {
    const resource = `team ${formatTeam(team)}`;
    return this.read(resource, async () => {
      const data = await this.octokit.paginate(this.octokit.teams.listMembersInOrg, {
        org: team.org,
        team_slug: team.slug,
        per_page: PER_PAGE,
      });
      return parseMemberLogins(data);
    });
  }

  /** Commit status on the head SHA. The only write this client performs. */
  async createCommitStatus(
    repo: RepoRef,
    sha: string,
    status: { state: "success" | "failure" | "error"; context: string; description: string; targetUrl: string | null },
  ): Promise<void> {
    await this.octokit.repos.createCommitStatus({
      owner: repo.owner,
      repo: repo.repo,
      sha,
      state: status.state,
      context: status.context,
      description: status.description,
      ...(status.targetUrl ? { target_url: status.targetUrl } : {}),
    });
  }
}
