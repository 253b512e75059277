import { AuthError, NotFoundError, TransientError } from "../src/errors.js";
import { classifyRequestError, retryAfterMs } from "../src/github/errors.js";

function httpError(status: number, message = "request failed", headers: Record<string, string> = {}): Error {
  return Object.assign(new Error(message), { status, response: { headers } });
}

describe("classifyRequestError", () => {
  it("401 → AuthError", () => {
    const err = classifyRequestError(httpError(401), "pull request acme/widgets#7");
    expect(err).toBeInstanceOf(AuthError);
    expect(err.message).toBe("GitHub rejected the credential while reading pull request acme/widgets#7 (401)");
  });

  it("403 without rate-limit markers → AuthError", () => {
    const err = classifyRequestError(httpError(403, "Resource not accessible by integration"), "team acme/core");
    expect(err).toBeInstanceOf(AuthError);
    expect(err.retryable).toBe(false);
  });

  it("403 with exhausted rate limit → TransientError with reset delay", () => {
    const err = classifyRequestError(
      httpError(403, "API rate limit exceeded", { "x-ratelimit-remaining": "0", "x-ratelimit-reset": "100" }),
      "reviews",
      40_000,
    );
    expect(err).toBeInstanceOf(TransientError);
    expect(err instanceof TransientError ? err.retryAfterMs : null).toBe(60_000);
  });

  it("403 secondary rate limit message → TransientError", () => {
    const err = classifyRequestError(httpError(403, "You have exceeded a secondary rate limit"), "reviews");
    expect(err).toBeInstanceOf(TransientError);
  });

  it("429 → TransientError honoring retry-after", () => {
    const err = classifyRequestError(httpError(429, "slow down", { "retry-after": "3" }), "reviews");
    expect(err instanceof TransientError ? err.retryAfterMs : null).toBe(3000);
  });

  it("404 → NotFoundError", () => {
    const err = classifyRequestError(httpError(404), "pull request acme/widgets#7");
    expect(err).toBeInstanceOf(NotFoundError);
    expect(err.message).toBe("pull request acme/widgets#7 not found or not accessible (404)");
  });

  it("5xx and errors without a status → TransientError", () => {
    expect(classifyRequestError(httpError(502, "Bad Gateway"), "reviews").message).toBe(
      "request for reviews failed (502): Bad Gateway",
    );
    expect(classifyRequestError(new TypeError("fetch failed"), "reviews").message).toBe(
      "request for reviews failed: fetch failed",
    );
  });

  it("passes taxonomy errors through", () => {
    const original = new NotFoundError("pull request");
    expect(classifyRequestError(original, "x")).toBe(original);
  });
});

describe("retryAfterMs", () => {
  it("is null without headers", () => {
    expect(retryAfterMs(httpError(500), 0)).toBeNull();
    expect(retryAfterMs("nope", 0)).toBeNull();
  });
});
