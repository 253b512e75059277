/**
 * Verdict → exit code. 0 approved, 1 policy not satisfied, 2 could not evaluate.
 */

import { TransientError } from "../errors.js";
import type { Verdict } from "../decision/types.js";
import type { Logger } from "../log.js";
import { errorKind, formatError, formatVerdict } from "./formatVerdict.js";

export const EXIT_APPROVED = 0;
export const EXIT_NOT_APPROVED = 1;
export const EXIT_ERROR = 2;

export type ExitCode = typeof EXIT_APPROVED | typeof EXIT_NOT_APPROVED | typeof EXIT_ERROR;

export type Outcome =
  | { kind: "verdict"; verdict: Verdict }
  | { kind: "error"; error: unknown };

/** Writes one line of operator output. */
export type Print = (line: string) => void;

export function exitCodeFor(outcome: Outcome): ExitCode {
  if (outcome.kind === "error") return EXIT_ERROR;
  return outcome.verdict.satisfied ? EXIT_APPROVED : EXIT_NOT_APPROVED;
}

export function report(verdict: Verdict, print: Print): ExitCode {
  for (const line of formatVerdict(verdict)) print(line);
  return exitCodeFor({ kind: "verdict", verdict });
}

export function reportError(error: unknown, print: Print, logger?: Logger): ExitCode {
  for (const line of formatError(error)) print(line);
  if (error instanceof TransientError) {
    logger?.warn("transient failure; re-running the check may succeed");
  } else if (errorKind(error) === "INTERNAL" && error instanceof Error && error.stack) {
    logger?.debug(error.stack);
  }
  return exitCodeFor({ kind: "error", error });
}
