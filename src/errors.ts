/**
 * Error taxonomy. Every failure that can stop an evaluation is one of these;
 * an unsatisfied policy is not an error (it is a Verdict).
 */

export type ErrorCode = "CONFIG" | "INVALID_POLICY" | "AUTH" | "NOT_FOUND" | "TRANSIENT";

export class ApprovalGateError extends Error {
  readonly code: ErrorCode;
  readonly retryable: boolean;

  constructor(code: ErrorCode, message: string, retryable = false, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ApprovalGateError";
    this.code = code;
    this.retryable = retryable;
  }
}

/** Bad or missing invocation inputs. */
export class ConfigError extends ApprovalGateError {
  readonly problems: string[];

  constructor(problems: string[] | string, code: ErrorCode = "CONFIG") {
    const list = Array.isArray(problems) ? problems : [problems];
    super(code, list.join("; "));
    this.name = "ConfigError";
    this.problems = list;
  }
}

export class InvalidPolicyError extends ConfigError {
  readonly source: string;

  constructor(source: string, problem: string) {
    super(`${source}: ${problem}`, "INVALID_POLICY");
    this.name = "InvalidPolicyError";
    this.source = source;
  }
}

/** Credential rejected or lacking permission. */
export class AuthError extends ApprovalGateError {
  readonly status: number;

  constructor(message: string, status: number, options?: { cause?: unknown }) {
    super("AUTH", message, false, options);
    this.name = "AuthError";
    this.status = status;
  }
}

export class NotFoundError extends ApprovalGateError {
  readonly resource: string;

  constructor(resource: string, message?: string, options?: { cause?: unknown }) {
    super("NOT_FOUND", message ?? `${resource} not found`, false, options);
    this.name = "NotFoundError";
    this.resource = resource;
  }
}

/** Network, rate-limit, timeout or malformed-payload failure; safe to retry. */
export class TransientError extends ApprovalGateError {
  /** Server-suggested wait before the next attempt, when known. */
  readonly retryAfterMs: number | null;

  constructor(message: string, retryAfterMs: number | null = null, options?: { cause?: unknown }) {
    super("TRANSIENT", message, true, options);
    this.name = "TransientError";
    this.retryAfterMs = retryAfterMs;
  }
}

export function isApprovalGateError(err: unknown): err is ApprovalGateError {
  return err instanceof ApprovalGateError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
