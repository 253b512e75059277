/** Approval requirements for a pull request. Plain data; see parsePolicy for validation. */

export interface TeamRef {
  org: string;
  slug: string;
}

/**
 * "any": approvals from outside the named set still count toward the minimum.
 * "required-only": the named set is exhaustive.
 */
export type ApproverScope = "any" | "required-only";

export interface RequiredApprovers {
  users: string[];
  teams: TeamRef[];
}

export interface Policy {
  minimumApprovals: number;
  requiredApprovers: RequiredApprovers;
  approverScope: ApproverScope;
  /** Approvals against a commit other than the current head do not count. */
  dismissStaleApprovals: boolean;
  /** The PR author's own approval does not count. */
  excludeAuthorApproval: boolean;
  /** Anyone who authored or committed a commit in the PR may not approve it. */
  forbidCommitterApproval: boolean;
}

export const DEFAULT_POLICY: Readonly<Policy> = Object.freeze({
  minimumApprovals: 1,
  requiredApprovers: { users: [], teams: [] },
  approverScope: "any",
  dismissStaleApprovals: true,
  excludeAuthorApproval: true,
  forbidCommitterApproval: true,
});

export function formatTeam(team: TeamRef): string {
  return `${team.org}/${team.slug}`;
}
