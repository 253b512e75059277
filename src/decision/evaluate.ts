/**
 * Approval policy evaluator. Pure: the verdict depends only on its arguments.
 */

import type { PullRequest, Review } from "../github/types.js";
import { formatTeam, type Policy } from "../policy/types.js";
import { sortStrings } from "../util/stableSort.js";
import { collapseReviews } from "./effectiveReviews.js";
import type { EvaluationContext, Verdict } from "./types.js";

export const NO_APPROVALS = "no approvals";

interface ApprovalSet {
  /** lower-case login → login as reviewed */
  approved: Map<string, string>;
  committerApprovers: string[];
}

function collectApprovals(
  pullRequest: PullRequest,
  effective: readonly Review[],
  policy: Policy,
  committers: ReadonlySet<string>,
): ApprovalSet {
  const author = pullRequest.author.toLowerCase();
  const head = pullRequest.headSha.toLowerCase();
  const approved = new Map<string, string>();
  const committerApprovers: string[] = [];

  for (const review of effective) {
    if (review.state !== "approved") continue;
    if (policy.dismissStaleApprovals && review.commitSha.toLowerCase() !== head) continue;

    const key = review.reviewer.toLowerCase();
    if (policy.excludeAuthorApproval && key === author) continue;
    if (policy.forbidCommitterApproval && committers.has(key)) {
      committerApprovers.push(review.reviewer);
      continue;
    }
    approved.set(key, review.reviewer);
  }

  return { approved, committerApprovers };
}

export function evaluate(
  pullRequest: PullRequest,
  reviews: readonly Review[],
  policy: Policy,
  context: EvaluationContext = {},
): Verdict {
  const committers = new Set((context.committers ?? []).map((c) => c.toLowerCase()));
  const { approved, committerApprovers } = collectApprovals(
    pullRequest,
    collapseReviews(reviews),
    policy,
    committers,
  );
  const { users, teams } = policy.requiredApprovers;

  const teamMembers = teams.map((team) => ({
    team,
    members: (context.teams?.membersOf(team) ?? []).map((m) => m.toLowerCase()),
  }));

  const named = new Set<string>(users.map((u) => u.toLowerCase()));
  for (const { members } of teamMembers) {
    for (const m of members) named.add(m);
  }

  const counted = [...approved.entries()]
    .filter(([key]) => policy.approverScope === "any" || named.has(key))
    .map(([, login]) => login);

  const reasons: string[] = [];

  if (committerApprovers.length > 0) {
    reasons.push(`approved by committer(s): ${sortStrings(committerApprovers).join(", ")}`);
  }

  const requiresAny = policy.minimumApprovals > 0 || users.length > 0 || teams.length > 0;
  if (approved.size === 0 && requiresAny) {
    reasons.push(NO_APPROVALS);
  } else {
    for (const user of users) {
      if (!approved.has(user.toLowerCase())) {
        reasons.push(`missing required approval from ${user}`);
      }
    }
    for (const { team, members } of teamMembers) {
      if (!members.some((m) => approved.has(m))) {
        reasons.push(`missing approval from a member of team ${formatTeam(team)}`);
      }
    }
    if (counted.length < policy.minimumApprovals) {
      const scope = policy.approverScope === "required-only" ? " from required approvers" : "";
      reasons.push(
        `insufficient approvals${scope}: ${counted.length} of ${policy.minimumApprovals} required`,
      );
    }
  }

  return {
    satisfied: reasons.length === 0,
    reasons,
    approvedBy: sortStrings(counted),
  };
}
