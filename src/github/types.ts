/** Snapshots read from GitHub for one evaluation. Validated at the client boundary. */

export type ReviewState = "approved" | "changes_requested" | "commented" | "dismissed";

export interface PullRequest {
  number: number;
  headSha: string;
  author: string;
  requestedReviewers: string[];
  requestedTeams: string[];
  draft: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface Review {
  id: number;
  reviewer: string;
  state: ReviewState;
  /** ISO-8601. */
  submittedAt: string;
  /** Commit the review was submitted against. */
  commitSha: string;
}

export interface Commit {
  sha: string;
  author: string | null;
  committer: string | null;
}
