/**
 * Facts the evaluator needs beyond the PR and its reviews, gathered through the client.
 */

import { StaticTeamDirectory } from "../decision/teamDirectory.js";
import type { TeamRef } from "../policy/types.js";
import { uniqueIgnoreCase } from "../util/stableSort.js";
import type { PlatformClient } from "./client.js";
import type { Commit } from "./types.js";

/** Looks up each team once, in order. Lookup errors propagate. */
export async function resolveTeamDirectory(
  teams: readonly TeamRef[],
  client: Pick<PlatformClient, "listTeamMembers">,
): Promise<StaticTeamDirectory> {
  const entries: [TeamRef, string[]][] = [];
  for (const team of teams) {
    entries.push([team, await client.listTeamMembers(team)]);
  }
  return new StaticTeamDirectory(entries);
}

/** Everyone who authored or committed a commit, first spelling kept. */
export function committerLogins(commits: readonly Commit[]): string[] {
  const logins: string[] = [];
  for (const c of commits) {
    if (c.author) logins.push(c.author);
    if (c.committer) logins.push(c.committer);
  }
  return uniqueIgnoreCase(logins);
}
