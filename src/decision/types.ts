import type { TeamRef } from "../policy/types.js";

/** Team → member logins. Resolution happens outside the evaluator. */
export interface TeamDirectory {
  membersOf(team: TeamRef): readonly string[] | undefined;
}

/** Capabilities and extra facts the evaluator reads but never fetches. */
export interface EvaluationContext {
  teams?: TeamDirectory;
  /** Logins that authored or committed a commit in the PR. */
  committers?: readonly string[];
}

export interface Verdict {
  satisfied: boolean;
  /** Every unmet requirement, in a fixed order. Empty iff satisfied. */
  reasons: string[];
  /** Approvers that counted toward the minimum, sorted. */
  approvedBy: string[];
}
