/**
 * Policy loader. Precedence: inline APPROVAL_POLICY, then APPROVAL_POLICY_PATH,
 * then .github/approval-policy.yml. Nothing found → default policy.
 */

import { existsSync, readFileSync } from "fs";
import { isAbsolute, join } from "path";
import { parse } from "yaml";
import { InvalidPolicyError, errorMessage } from "../errors.js";
import { parsePolicy } from "../policy/parsePolicy.js";
import { DEFAULT_POLICY, type Policy } from "../policy/types.js";

export const DEFAULT_POLICY_FILE = ".github/approval-policy.yml";

export interface PolicySource {
  inline: string | null;
  path: string | null;
}

export interface LoadedPolicy {
  policy: Policy;
  /** "inline", a file path, or "default". */
  origin: string;
}

function defaultPolicy(): Policy {
  return {
    ...DEFAULT_POLICY,
    requiredApprovers: { users: [], teams: [] },
  };
}

/** Parse policy YAML text. Invalid YAML or schema → InvalidPolicyError. */
export function parsePolicyYaml(text: string, source: string): Policy {
  let raw: unknown;
  try {
    raw = parse(text);
  } catch (err) {
    throw new InvalidPolicyError(source, `invalid YAML: ${errorMessage(err)}`);
  }
  return parsePolicy(raw, source);
}

export function loadPolicy(cwd: string, src: PolicySource): LoadedPolicy {
  if (src.inline != null) {
    return { policy: parsePolicyYaml(src.inline, "APPROVAL_POLICY"), origin: "inline" };
  }

  if (src.path != null) {
    const path = isAbsolute(src.path) ? src.path : join(cwd, src.path);
    let content: string;
    try {
      content = readFileSync(path, "utf8");
    } catch (err) {
      throw new InvalidPolicyError(src.path, `cannot read policy file: ${errorMessage(err)}`);
    }
    return { policy: parsePolicyYaml(content, src.path), origin: src.path };
  }

  const defaultPath = join(cwd, DEFAULT_POLICY_FILE);
  if (!existsSync(defaultPath)) {
    return { policy: defaultPolicy(), origin: "default" };
  }
  const content = readFileSync(defaultPath, "utf8");
  return { policy: parsePolicyYaml(content, DEFAULT_POLICY_FILE), origin: DEFAULT_POLICY_FILE };
}
