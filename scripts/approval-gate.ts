#!/usr/bin/env node
/**
 * CI entry point. Reads GITHUB_REPOSITORY, PR_NUMBER and GITHUB_TOKEN from the
 * environment and exits 0 (approved), 1 (not approved) or 2 (could not evaluate).
 */

import { runGate } from "../src/run/runGate.js";

try {
  process.exit(await runGate(process.env));
} catch (err) {
  console.error("approval-gate: error: " + (err instanceof Error ? err.message : String(err)));
  process.exit(2);
}
