/**
 * Policy validation (frozen schema). Unknown keys or invalid values → InvalidPolicyError.
 */

import { InvalidPolicyError } from "../errors.js";
import type { ApproverScope, Policy, RequiredApprovers, TeamRef } from "./types.js";

const ALLOWED_KEYS = new Set([
  "minimumApprovals",
  "requiredApprovers",
  "approverScope",
  "dismissStaleApprovals",
  "excludeAuthorApproval",
  "forbidCommitterApproval",
]);
const ALLOWED_APPROVER_KEYS = new Set(["users", "teams"]);
const VALID_SCOPES = new Set<string>(["any", "required-only"]);

const LOGIN_RE = /^[A-Za-z0-9](?:[A-Za-z0-9-]*[A-Za-z0-9])?(?:\[bot\])?$/;
const TEAM_RE = /^@?([A-Za-z0-9](?:[A-Za-z0-9-]*[A-Za-z0-9])?)\/([A-Za-z0-9_.-]+)$/;

function isRecord(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

export function parseTeamRef(value: string): TeamRef | null {
  const m = TEAM_RE.exec(value.trim());
  if (!m || !m[1] || !m[2]) return null;
  return { org: m[1], slug: m[2] };
}

function parseStringList(source: string, key: string, value: unknown): string[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new InvalidPolicyError(source, `${key} must be a list`);
  }
  const out: string[] = [];
  for (let i = 0; i < value.length; i++) {
    const v: unknown = value[i];
    if (typeof v !== "string" || v.trim() === "") {
      throw new InvalidPolicyError(source, `${key}[${i}] must be a non-empty string`);
    }
    out.push(v.trim());
  }
  return out;
}

function parseApprovers(source: string, value: unknown): RequiredApprovers {
  if (value === undefined || value === null) return { users: [], teams: [] };
  if (!isRecord(value)) {
    throw new InvalidPolicyError(source, "requiredApprovers must be a mapping with users and/or teams");
  }
  for (const key of Object.keys(value)) {
    if (!ALLOWED_APPROVER_KEYS.has(key)) {
      throw new InvalidPolicyError(source, `unknown key "requiredApprovers.${key}"`);
    }
  }

  const users: string[] = [];
  const seenUsers = new Set<string>();
  for (const raw of parseStringList(source, "requiredApprovers.users", value.users)) {
    const login = raw.replace(/^@/, "");
    if (!LOGIN_RE.test(login)) {
      throw new InvalidPolicyError(source, `requiredApprovers.users: "${raw}" is not a valid login`);
    }
    const key = login.toLowerCase();
    if (seenUsers.has(key)) continue;
    seenUsers.add(key);
    users.push(login);
  }

  const teams: TeamRef[] = [];
  const seenTeams = new Set<string>();
  for (const raw of parseStringList(source, "requiredApprovers.teams", value.teams)) {
    const team = parseTeamRef(raw);
    if (!team) {
      throw new InvalidPolicyError(source, `requiredApprovers.teams: "${raw}" must be org/team-slug`);
    }
    const key = `${team.org}/${team.slug}`.toLowerCase();
    if (seenTeams.has(key)) continue;
    seenTeams.add(key);
    teams.push(team);
  }

  return { users, teams };
}

function parseFlag(source: string, obj: Record<string, unknown>, key: string): boolean {
  const v = obj[key];
  if (v === undefined) return true;
  if (typeof v !== "boolean") {
    throw new InvalidPolicyError(source, `${key} must be true or false`);
  }
  return v;
}

/**
 * Validate a decoded policy document. `source` names where it came from and
 * prefixes every error message.
 */
export function parsePolicy(raw: unknown, source: string): Policy {
  if (!isRecord(raw)) {
    throw new InvalidPolicyError(source, "root must be a mapping");
  }

  for (const key of Object.keys(raw)) {
    if (!ALLOWED_KEYS.has(key)) {
      throw new InvalidPolicyError(source, `unknown key "${key}"`);
    }
  }

  if (raw.minimumApprovals === undefined || raw.minimumApprovals === null) {
    throw new InvalidPolicyError(source, "minimumApprovals is required");
  }
  const minimumApprovals = raw.minimumApprovals;
  if (typeof minimumApprovals !== "number" || !Number.isInteger(minimumApprovals)) {
    throw new InvalidPolicyError(source, "minimumApprovals must be an integer");
  }
  if (minimumApprovals < 0) {
    throw new InvalidPolicyError(source, "minimumApprovals must not be negative");
  }

  const requiredApprovers = parseApprovers(source, raw.requiredApprovers);

  let approverScope: ApproverScope = "any";
  if (raw.approverScope !== undefined) {
    const scope = raw.approverScope;
    if (typeof scope !== "string" || !VALID_SCOPES.has(scope)) {
      throw new InvalidPolicyError(source, "approverScope must be any or required-only");
    }
    approverScope = scope === "required-only" ? "required-only" : "any";
  }

  if (approverScope === "required-only") {
    const { users, teams } = requiredApprovers;
    if (users.length === 0 && teams.length === 0 && minimumApprovals > 0) {
      throw new InvalidPolicyError(
        source,
        "approverScope required-only needs at least one required user or team",
      );
    }
    if (teams.length === 0 && minimumApprovals > users.length) {
      throw new InvalidPolicyError(
        source,
        `minimumApprovals (${minimumApprovals}) exceeds the ${users.length} required user(s) allowed to approve`,
      );
    }
  }

  return {
    minimumApprovals,
    requiredApprovers,
    approverScope,
    dismissStaleApprovals: parseFlag(source, raw, "dismissStaleApprovals"),
    excludeAuthorApproval: parseFlag(source, raw, "excludeAuthorApproval"),
    forbidCommitterApproval: parseFlag(source, raw, "forbidCommitterApproval"),
  };
}
