/**
 * Invocation inputs from the CI environment. Every problem is collected before
 * throwing so one run reports all of them.
 */

import { ConfigError } from "../errors.js";
import { isLogLevel, type LogLevel } from "../log.js";

export type Env = Readonly<Record<string, string | undefined>>;

const REQUIRED_ENV = ["GITHUB_REPOSITORY", "PR_NUMBER", "GITHUB_TOKEN"] as const;

const DEFAULT_API_URL = "https://api.github.com";
const DEFAULT_TIMEOUT_MS = 60000;
const MIN_TIMEOUT_MS = 1000;
const MAX_TIMEOUT_MS = 600000;
const DEFAULT_MAX_ATTEMPTS = 3;
const MIN_MAX_ATTEMPTS = 1;
const MAX_MAX_ATTEMPTS = 10;

const REPO_RE = /^([A-Za-z0-9](?:[A-Za-z0-9-]*[A-Za-z0-9])?)\/([A-Za-z0-9._-]+)$/;

export interface RepoRef {
  owner: string;
  repo: string;
}

export interface GateConfig {
  repository: RepoRef;
  prNumber: number;
  token: string;
  apiUrl: string;
  policyInline: string | null;
  policyPath: string | null;
  timeoutMs: number;
  maxAttempts: number;
  publishStatus: boolean;
  logLevel: LogLevel;
  /** Link to the workflow run, used as the commit status target. */
  runUrl: string | null;
}

function getEnv(env: Env, key: string): string {
  const v = env[key];
  if (v == null || String(v).trim() === "") return "";
  return String(v).trim();
}

export function parseRepository(value: string): RepoRef | null {
  const m = REPO_RE.exec(value);
  if (!m || !m[1] || !m[2]) return null;
  if (m[2] === "." || m[2] === "..") return null;
  return { owner: m[1], repo: m[2] };
}

export function formatRepository(ref: RepoRef): string {
  return `${ref.owner}/${ref.repo}`;
}

function parseIntInRange(
  env: Env,
  key: string,
  fallback: number,
  min: number,
  max: number,
  problems: string[],
): number {
  const raw = getEnv(env, key);
  if (raw === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min || n > max) {
    problems.push(`${key} must be an integer between ${min} and ${max} (got "${raw}")`);
    return fallback;
  }
  return n;
}

function parseFlag(env: Env, key: string, problems: string[]): boolean {
  const raw = getEnv(env, key).toLowerCase();
  if (raw === "" || raw === "false" || raw === "0") return false;
  if (raw === "true" || raw === "1") return true;
  problems.push(`${key} must be true or false (got "${raw}")`);
  return false;
}

/**
 * Read and validate invocation inputs. Throws ConfigError listing every missing
 * or malformed value.
 */
export function readGateConfig(env: Env): GateConfig {
  const problems: string[] = [];

  const missing = REQUIRED_ENV.filter((key) => getEnv(env, key) === "");
  if (missing.length > 0) {
    problems.push(`Missing required environment variables: ${missing.join(", ")}`);
  }

  const repoRaw = getEnv(env, "GITHUB_REPOSITORY");
  const repository = repoRaw === "" ? null : parseRepository(repoRaw);
  if (repoRaw !== "" && !repository) {
    problems.push(`Invalid GITHUB_REPOSITORY: ${repoRaw}. Must be owner/repo.`);
  }

  const prRaw = getEnv(env, "PR_NUMBER");
  const prNumber = Number(prRaw);
  if (prRaw !== "" && (!/^\d+$/.test(prRaw) || !Number.isSafeInteger(prNumber) || prNumber < 1)) {
    problems.push(`Invalid PR_NUMBER: ${prRaw}. Must be a positive integer.`);
  }

  const apiUrl = (getEnv(env, "GITHUB_API_URL") || DEFAULT_API_URL).replace(/\/+$/, "");
  if (!/^https?:\/\//.test(apiUrl)) {
    problems.push(`Invalid GITHUB_API_URL: ${apiUrl}. Must be an http(s) URL.`);
  }

  const timeoutMs = parseIntInRange(env, "APPROVAL_GATE_TIMEOUT_MS", DEFAULT_TIMEOUT_MS, MIN_TIMEOUT_MS, MAX_TIMEOUT_MS, problems);
  const maxAttempts = parseIntInRange(env, "APPROVAL_GATE_MAX_ATTEMPTS", DEFAULT_MAX_ATTEMPTS, MIN_MAX_ATTEMPTS, MAX_MAX_ATTEMPTS, problems);
  const publishStatus = parseFlag(env, "APPROVAL_GATE_PUBLISH_STATUS", problems);

  const levelRaw = getEnv(env, "APPROVAL_GATE_LOG_LEVEL").toLowerCase();
  let logLevel: LogLevel = "info";
  if (levelRaw !== "") {
    if (isLogLevel(levelRaw)) logLevel = levelRaw;
    else problems.push(`APPROVAL_GATE_LOG_LEVEL must be debug, info, warn or error (got "${levelRaw}")`);
  }

  if (problems.length > 0 || !repository) {
    throw new ConfigError(problems);
  }

  const serverUrl = getEnv(env, "GITHUB_SERVER_URL").replace(/\/+$/, "");
  const runId = getEnv(env, "GITHUB_RUN_ID");
  const runUrl = serverUrl && runId ? `${serverUrl}/${formatRepository(repository)}/actions/runs/${runId}` : null;

  return {
    repository,
    prNumber,
    token: getEnv(env, "GITHUB_TOKEN"),
    apiUrl,
    policyInline: getEnv(env, "APPROVAL_POLICY") || null,
    policyPath: getEnv(env, "APPROVAL_POLICY_PATH") || null,
    timeoutMs,
    maxAttempts,
    publishStatus,
    logLevel,
    runUrl,
  };
}
