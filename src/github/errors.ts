/**
 * Maps Octokit request failures onto the error taxonomy.
 */

import {
  ApprovalGateError,
  AuthError,
  NotFoundError,
  TransientError,
} from "../errors.js";

function isRecord(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

export function statusOf(err: unknown): number | null {
  if (err instanceof Error && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return null;
}

function headerOf(err: unknown, name: string): string | null {
  if (!(err instanceof Error) || !("response" in err)) return null;
  const response = err.response;
  if (!isRecord(response) || !isRecord(response.headers)) return null;
  const v = response.headers[name];
  return typeof v === "string" || typeof v === "number" ? String(v) : null;
}

/** Wait suggested by retry-after or the rate-limit reset header. */
export function retryAfterMs(err: unknown, now: number): number | null {
  const retryAfter = headerOf(err, "retry-after");
  if (retryAfter != null) {
    const seconds = Number(retryAfter);
    if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;
  }
  if (headerOf(err, "x-ratelimit-remaining") === "0") {
    const reset = Number(headerOf(err, "x-ratelimit-reset"));
    if (Number.isFinite(reset) && reset > 0) return Math.max(0, reset * 1000 - now);
  }
  return null;
}

function isRateLimited(err: unknown): boolean {
  if (headerOf(err, "x-ratelimit-remaining") === "0") return true;
  const message = err instanceof Error ? err.message : "";
  return /rate limit/i.test(message);
}

/**
 * Classify a failed request. `resource` names what was being read, for messages.
 * Errors already in the taxonomy pass through unchanged.
 */
export function classifyRequestError(err: unknown, resource: string, now: number = Date.now()): ApprovalGateError {
  if (err instanceof ApprovalGateError) return err;

  const message = err instanceof Error ? err.message : String(err);
  const status = statusOf(err);

  if (status === 401) {
    return new AuthError(`GitHub rejected the credential while reading ${resource} (401)`, status, { cause: err });
  }
  if (status === 403 || status === 429) {
    if (status === 429 || isRateLimited(err)) {
      return new TransientError(`rate limited while reading ${resource}`, retryAfterMs(err, now), { cause: err });
    }
    return new AuthError(`credential lacks permission to read ${resource} (403): ${message}`, status, { cause: err });
  }
  if (status === 404 || status === 410) {
    return new NotFoundError(resource, `${resource} not found or not accessible (${status})`, { cause: err });
  }
  if (status != null && status >= 400 && status < 500) {
    return new NotFoundError(resource, `${resource} could not be read (${status}): ${message}`, { cause: err });
  }
  return new TransientError(
    `request for ${resource} failed${status != null ? ` (${status})` : ""}: ${message}`,
    null,
    { cause: err },
  );
}
