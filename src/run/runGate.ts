/**
 * One approval check: config → policy → GitHub reads → verdict → exit code.
 * Never throws; every failure becomes exit code 2 with its reason printed.
 */

import { readGateConfig, formatRepository, type Env, type GateConfig } from "../config/env.js";
import { loadPolicy } from "../config/policyYaml.js";
import { evaluate } from "../decision/evaluate.js";
import type { TeamDirectory } from "../decision/types.js";
import { GitHubClient, type PlatformClient } from "../github/client.js";
import { committerLogins, resolveTeamDirectory } from "../github/context.js";
import type { PullRequest, Review } from "../github/types.js";
import { errorMessage } from "../errors.js";
import { ConsoleLogger, type Logger } from "../log.js";
import { formatTeam, type Policy } from "../policy/types.js";
import { publishCommitStatus, type CommitStatusWriter } from "../report/commitStatus.js";
import { report, reportError, type ExitCode, type Outcome, type Print } from "../report/reporter.js";
import { withTimeout } from "./timeout.js";

export type GateClient = PlatformClient & CommitStatusWriter;

export interface GateDeps {
  cwd?: string;
  logger?: Logger;
  print?: Print;
  createClient?: (config: GateConfig, signal: AbortSignal, logger: Logger) => GateClient;
}

interface Snapshot {
  pullRequest: PullRequest;
  reviews: Review[];
  committers: string[];
  teams: TeamDirectory;
}

/** What is known before the whole snapshot is; lets a failed run still mark the head commit. */
interface Progress {
  pullRequest?: PullRequest;
}

function defaultClient(config: GateConfig, signal: AbortSignal, logger: Logger): GateClient {
  return new GitHubClient({
    token: config.token,
    baseUrl: config.apiUrl,
    logger,
    signal,
    retry: { maxAttempts: config.maxAttempts },
  });
}

export function describePolicy(policy: Policy): string {
  const parts = [`minimum ${policy.minimumApprovals}`];
  const { users, teams } = policy.requiredApprovers;
  if (users.length > 0) parts.push(`users [${users.join(", ")}]`);
  if (teams.length > 0) parts.push(`teams [${teams.map(formatTeam).join(", ")}]`);
  parts.push(`scope ${policy.approverScope}`);
  const off = [
    policy.dismissStaleApprovals ? null : "stale approvals count",
    policy.excludeAuthorApproval ? null : "author may approve",
    policy.forbidCommitterApproval ? null : "committers may approve",
  ].filter((s): s is string => s !== null);
  return parts.concat(off).join(", ");
}

async function gather(
  client: PlatformClient,
  config: GateConfig,
  policy: Policy,
  progress: Progress,
): Promise<Snapshot> {
  const { repository, prNumber } = config;
  const [pullRequest, reviews, commits] = await Promise.all([
    client.fetchPullRequest(repository, prNumber).then((pr) => {
      progress.pullRequest = pr;
      return pr;
    }),
    client.fetchReviews(repository, prNumber),
    policy.forbidCommitterApproval ? client.fetchCommits(repository, prNumber) : Promise.resolve([]),
  ]);
  const teams = await resolveTeamDirectory(policy.requiredApprovers.teams, client);
  return { pullRequest, reviews, committers: committerLogins(commits), teams };
}

/** Publishing shares the run's deadline; running out of it is a non-fatal publish failure. */
async function publishWithin(
  deadline: number,
  controller: AbortController,
  client: GateClient,
  config: GateConfig,
  sha: string,
  outcome: Outcome,
  logger: Logger,
): Promise<void> {
  const remainingMs = Math.max(0, deadline - Date.now());
  try {
    await withTimeout(
      publishCommitStatus(client, config.repository, sha, outcome, config.runUrl, logger),
      remainingMs,
      controller,
      "status publish",
    );
  } catch (err) {
    logger.warn(`status publish failed (non-fatal): ${errorMessage(err)}`);
  }
}

export async function runGate(env: Env, deps: GateDeps = {}): Promise<ExitCode> {
  const print: Print = deps.print ?? ((line) => console.log(line));
  const cwd = deps.cwd ?? process.cwd();

  let config: GateConfig;
  try {
    config = readGateConfig(env);
  } catch (err) {
    return reportError(err, print, deps.logger);
  }
  const logger = deps.logger ?? new ConsoleLogger(config.logLevel);

  let policy: Policy;
  try {
    const loaded = loadPolicy(cwd, { inline: config.policyInline, path: config.policyPath });
    policy = loaded.policy;
    logger.info(`policy (${loaded.origin}): ${describePolicy(policy)}`);
  } catch (err) {
    return reportError(err, print, logger);
  }

  const controller = new AbortController();
  const client = (deps.createClient ?? defaultClient)(config, controller.signal, logger);
  const target = `${formatRepository(config.repository)}#${config.prNumber}`;
  const deadline = Date.now() + config.timeoutMs;
  const progress: Progress = {};

  try {
    let snapshot: Snapshot;
    try {
      snapshot = await withTimeout(
        gather(client, config, policy, progress),
        config.timeoutMs,
        controller,
        `evaluation of ${target}`,
      );
    } catch (err) {
      const code = reportError(err, print, logger);
      // nothing left to publish with once the deadline has aborted the client
      if (config.publishStatus && progress.pullRequest && !controller.signal.aborted) {
        const outcome: Outcome = { kind: "error", error: err };
        await publishWithin(deadline, controller, client, config, progress.pullRequest.headSha, outcome, logger);
      }
      return code;
    }

    const { pullRequest, reviews } = snapshot;
    logger.info(
      `${target} head ${pullRequest.headSha.slice(0, 7)} by ${pullRequest.author}: ${reviews.length} review(s)`,
    );
    if (pullRequest.draft) logger.info(`${target} is a draft`);

    const verdict = evaluate(pullRequest, reviews, policy, {
      teams: snapshot.teams,
      committers: snapshot.committers,
    });
    const code = report(verdict, print);

    if (config.publishStatus) {
      await publishWithin(deadline, controller, client, config, pullRequest.headSha, { kind: "verdict", verdict }, logger);
    }
    return code;
  } finally {
    controller.abort();
  }
}
