import { parseRepository, readGateConfig } from "../src/config/env.js";
import { ConfigError } from "../src/errors.js";

const BASE = {
  GITHUB_REPOSITORY: "acme/widgets",
  PR_NUMBER: "7",
  GITHUB_TOKEN: "test-token",
};

function problemsOf(env: Record<string, string>): string[] {
  try {
    readGateConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) return err.problems;
    throw err;
  }
  throw new Error("expected ConfigError");
}

describe("readGateConfig", () => {
  it("reads required values and applies defaults", () => {
    expect(readGateConfig(BASE)).toEqual({
      repository: { owner: "acme", repo: "widgets" },
      prNumber: 7,
      token: "test-token",
      apiUrl: "https://api.github.com",
      policyInline: null,
      policyPath: null,
      timeoutMs: 60000,
      maxAttempts: 3,
      publishStatus: false,
      logLevel: "info",
      runUrl: null,
    });
  });

  it("lists every missing variable in one error", () => {
    expect(problemsOf({})).toEqual([
      "Missing required environment variables: GITHUB_REPOSITORY, PR_NUMBER, GITHUB_TOKEN",
    ]);
  });

  it("treats blank values as missing", () => {
    expect(problemsOf({ ...BASE, GITHUB_TOKEN: "  " })).toEqual([
      "Missing required environment variables: GITHUB_TOKEN",
    ]);
  });

  it("rejects a malformed PR number and repository together", () => {
    expect(problemsOf({ ...BASE, PR_NUMBER: "abc", GITHUB_REPOSITORY: "widgets" })).toEqual([
      "Invalid GITHUB_REPOSITORY: widgets. Must be owner/repo.",
      "Invalid PR_NUMBER: abc. Must be a positive integer.",
    ]);
    expect(problemsOf({ ...BASE, PR_NUMBER: "0" })).toEqual(["Invalid PR_NUMBER: 0. Must be a positive integer."]);
    expect(problemsOf({ ...BASE, PR_NUMBER: "1.5" })).toEqual(["Invalid PR_NUMBER: 1.5. Must be a positive integer."]);
  });

  it("validates optional tuning values", () => {
    expect(problemsOf({ ...BASE, APPROVAL_GATE_TIMEOUT_MS: "5" })).toEqual([
      'APPROVAL_GATE_TIMEOUT_MS must be an integer between 1000 and 600000 (got "5")',
    ]);
    expect(problemsOf({ ...BASE, APPROVAL_GATE_PUBLISH_STATUS: "maybe" })).toEqual([
      'APPROVAL_GATE_PUBLISH_STATUS must be true or false (got "maybe")',
    ]);
    expect(problemsOf({ ...BASE, APPROVAL_GATE_LOG_LEVEL: "trace" })).toEqual([
      'APPROVAL_GATE_LOG_LEVEL must be debug, info, warn or error (got "trace")',
    ]);
  });

  it("reads optional values", () => {
    const config = readGateConfig({
      ...BASE,
      GITHUB_API_URL: "https://ghe.example.test/api/v3/",
      APPROVAL_POLICY_PATH: "policies/merge.yml",
      APPROVAL_GATE_TIMEOUT_MS: "30000",
      APPROVAL_GATE_MAX_ATTEMPTS: "5",
      APPROVAL_GATE_PUBLISH_STATUS: "true",
      APPROVAL_GATE_LOG_LEVEL: "DEBUG",
      GITHUB_SERVER_URL: "https://github.com",
      GITHUB_RUN_ID: "42",
    });
    expect(config.apiUrl).toBe("https://ghe.example.test/api/v3");
    expect(config.policyPath).toBe("policies/merge.yml");
    expect(config.timeoutMs).toBe(30000);
    expect(config.maxAttempts).toBe(5);
    expect(config.publishStatus).toBe(true);
    expect(config.logLevel).toBe("debug");
    expect(config.runUrl).toBe("https://github.com/acme/widgets/actions/runs/42");
  });
});

describe("parseRepository", () => {
  it("splits owner/repo", () => {
    expect(parseRepository("acme/widgets.js")).toEqual({ owner: "acme", repo: "widgets.js" });
    expect(parseRepository("acme/widgets/extra")).toBeNull();
    expect(parseRepository("acme/..")).toBeNull();
    expect(parseRepository("/widgets")).toBeNull();
  });
});
