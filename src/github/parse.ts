/**
 * Payload → snapshot parsing. The API is trusted for shape only after these checks;
 * a payload that fails them is reported as TransientError (a retry may see a complete one).
 */

import { NotFoundError, TransientError } from "../errors.js";
import type { Commit, PullRequest, Review, ReviewState } from "./types.js";

const REVIEW_STATES: Record<string, ReviewState | null> = {
  APPROVED: "approved",
  CHANGES_REQUESTED: "changes_requested",
  COMMENTED: "commented",
  DISMISSED: "dismissed",
  PENDING: null,
};

const SHA_RE = /^[0-9a-f]{40}(?:[0-9a-f]{24})?$/i;

function isRecord(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

function loginOf(user: unknown): string | null {
  if (!isRecord(user)) return null;
  return typeof user.login === "string" && user.login !== "" ? user.login : null;
}

function malformed(what: string, detail: string): TransientError {
  return new TransientError(`malformed ${what} payload: ${detail}`);
}

function isTimestamp(v: unknown): v is string {
  return typeof v === "string" && !Number.isNaN(Date.parse(v));
}

export function parsePullRequest(data: unknown): PullRequest {
  if (!isRecord(data)) throw malformed("pull request", "not an object");
  if (typeof data.number !== "number") {
    throw new NotFoundError("pull request", "pull request payload has no number");
  }

  const head = data.head;
  const headSha = isRecord(head) && typeof head.sha === "string" ? head.sha : "";
  if (!SHA_RE.test(headSha)) throw malformed("pull request", "missing head sha");

  const author = loginOf(data.user);
  if (!author) throw malformed("pull request", "missing author");

  if (!isTimestamp(data.created_at) || !isTimestamp(data.updated_at)) {
    throw malformed("pull request", "missing timestamps");
  }

  const requestedReviewers = Array.isArray(data.requested_reviewers)
    ? data.requested_reviewers.map(loginOf).filter((l): l is string => l !== null)
    : [];
  const requestedTeams = Array.isArray(data.requested_teams)
    ? data.requested_teams
        .map((t: unknown) => (isRecord(t) && typeof t.slug === "string" ? t.slug : null))
        .filter((s): s is string => s !== null)
    : [];

  return {
    number: data.number,
    headSha: headSha.toLowerCase(),
    author,
    requestedReviewers,
    requestedTeams,
    draft: data.draft === true,
    createdAt: data.created_at,
    updatedAt: data.updated_at,
  };
}

/**
 * Returns null for reviews that carry no decision: pending (unsubmitted) reviews
 * and reviews whose author account no longer exists.
 */
export function parseReview(data: unknown): Review | null {
  if (!isRecord(data)) throw malformed("review", "not an object");
  if (typeof data.id !== "number") throw malformed("review", "missing id");
  if (typeof data.state !== "string" || !Object.prototype.hasOwnProperty.call(REVIEW_STATES, data.state)) {
    throw malformed("review", `unknown state ${String(data.state)}`);
  }

  const state = REVIEW_STATES[data.state];
  if (state == null) return null;

  const reviewer = loginOf(data.user);
  if (!reviewer) return null;

  if (!isTimestamp(data.submitted_at)) throw malformed("review", `review ${data.id} has no submitted_at`);
  const commitSha = typeof data.commit_id === "string" ? data.commit_id.toLowerCase() : "";

  return {
    id: data.id,
    reviewer,
    state,
    submittedAt: data.submitted_at,
    commitSha,
  };
}

export function parseReviews(data: unknown): Review[] {
  if (!Array.isArray(data)) throw malformed("review list", "not an array");
  const out: Review[] = [];
  for (const item of data) {
    const review = parseReview(item);
    if (review) out.push(review);
  }
  return out;
}

export function parseCommits(data: unknown): Commit[] {
  if (!Array.isArray(data)) throw malformed("commit list", "not an array");
  return data.map((item: unknown) => {
    if (!isRecord(item) || typeof item.sha !== "string") throw malformed("commit", "missing sha");
    return {
      sha: item.sha.toLowerCase(),
      author: loginOf(item.author),
      committer: loginOf(item.committer),
    };
  });
}

export function parseMemberLogins(data: unknown): string[] {
  if (!Array.isArray(data)) throw malformed("team member list", "not an array");
  return data.map(loginOf).filter((l): l is string => l !== null);
}
