import type { PullRequest, Review, ReviewState } from "../../src/github/types.js";
import { DEFAULT_POLICY, type Policy } from "../../src/policy/types.js";

export const HEAD = "a".repeat(40);
export const OLD = "b".repeat(40);

export function pullRequest(overrides: Partial<PullRequest> = {}): PullRequest {
  return {
    number: 7,
    headSha: HEAD,
    author: "author",
    requestedReviewers: [],
    requestedTeams: [],
    draft: false,
    createdAt: "2026-01-05T10:00:00Z",
    updatedAt: "2026-01-06T10:00:00Z",
    ...overrides,
  };
}

/** Review submitted `minute` minutes after 2026-01-06T12:00Z. */
export function review(
  reviewer: string,
  state: ReviewState,
  minute: number,
  commitSha: string = HEAD,
): Review {
  return {
    id: 1000 + minute,
    reviewer,
    state,
    submittedAt: new Date(Date.UTC(2026, 0, 6, 12, minute)).toISOString(),
    commitSha,
  };
}

export function policy(overrides: Partial<Policy> = {}): Policy {
  return {
    ...DEFAULT_POLICY,
    requiredApprovers: { users: [], teams: [] },
    ...overrides,
  };
}
