/**
 * Operator output for a run. Deterministic: no timestamps, reasons in verdict order.
 */

import { isApprovalGateError } from "../errors.js";
import type { Verdict } from "../decision/types.js";

export function formatVerdict(verdict: Verdict): string[] {
  const lines: string[] = [];
  lines.push(`RESULT: ${verdict.satisfied ? "APPROVED" : "NOT APPROVED"}`);
  lines.push(`Approved by: ${verdict.approvedBy.length > 0 ? verdict.approvedBy.join(", ") : "(none)"}`);

  if (verdict.satisfied) return lines;

  lines.push("");
  lines.push("Unmet requirements:");
  for (const reason of verdict.reasons) {
    lines.push(`- ${reason}`);
  }
  return lines;
}

export function errorKind(err: unknown): string {
  return isApprovalGateError(err) ? err.code : "INTERNAL";
}

export function formatError(err: unknown): string[] {
  const message = err instanceof Error ? err.message : String(err);
  return [
    "RESULT: ERROR",
    "",
    `Could not evaluate approval policy (${errorKind(err)}):`,
    `- ${message}`,
  ];
}
