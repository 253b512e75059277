import { formatTeam, type TeamRef } from "../policy/types.js";
import type { TeamDirectory } from "./types.js";

function teamKey(team: TeamRef): string {
  return formatTeam(team).toLowerCase();
}

/** Fixed team → members mapping. Unknown teams have no members. */
export class StaticTeamDirectory implements TeamDirectory {
  private readonly members = new Map<string, readonly string[]>();

  constructor(entries: ReadonlyArray<readonly [TeamRef, readonly string[]]> = []) {
    for (const [team, logins] of entries) {
      this.members.set(teamKey(team), [...logins]);
    }
  }

  membersOf(team: TeamRef): readonly string[] | undefined {
    return this.members.get(teamKey(team));
  }
}
