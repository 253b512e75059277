/**
 * Optional commit status on the head SHA. Publishing never changes the exit code.
 * Description trimmed to 140 chars (GitHub limit).
 */

import { errorMessage } from "../errors.js";
import type { RepoRef } from "../config/env.js";
import type { Logger } from "../log.js";
import { errorKind } from "./formatVerdict.js";
import type { Outcome } from "./reporter.js";

export const STATUS_CONTEXT = "approval-gate";
const MAX_DESCRIPTION = 140;

export type CommitState = "success" | "failure" | "error";

export interface CommitStatus {
  state: CommitState;
  context: string;
  description: string;
  targetUrl: string | null;
}

export interface CommitStatusWriter {
  createCommitStatus(repo: RepoRef, sha: string, status: CommitStatus): Promise<void>;
}

export function stateAndDescription(outcome: Outcome): { state: CommitState; description: string } {
  if (outcome.kind === "error") {
    return { state: "error", description: `Could not evaluate approval policy (${errorKind(outcome.error)})` };
  }
  const { verdict } = outcome;
  if (verdict.satisfied) {
    const description = verdict.approvedBy.length > 0
      ? "Approved by " + verdict.approvedBy.join(", ")
      : "Approval policy satisfied";
    return { state: "success", description: description.slice(0, MAX_DESCRIPTION) };
  }
  const [first, ...rest] = verdict.reasons;
  let description = first ?? "Approval policy not satisfied";
  if (rest.length > 0) description += ` (+${rest.length} more)`;
  return { state: "failure", description: description.slice(0, MAX_DESCRIPTION) };
}

/** Returns whether the status was written. */
export async function publishCommitStatus(
  writer: CommitStatusWriter,
  repo: RepoRef,
  sha: string,
  outcome: Outcome,
  targetUrl: string | null,
  logger: Logger,
): Promise<boolean> {
  const { state, description } = stateAndDescription(outcome);
  try {
    await writer.createCommitStatus(repo, sha, { state, context: STATUS_CONTEXT, description, targetUrl });
    logger.info(`status: ${state}`);
    return true;
  } catch (err) {
    logger.warn(`status publish failed (non-fatal): ${errorMessage(err)}`);
    return false;
  }
}
