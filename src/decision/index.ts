export { evaluate, NO_APPROVALS } from "./evaluate.js";
export { collapseReviews } from "./effectiveReviews.js";
export { StaticTeamDirectory } from "./teamDirectory.js";
export type { EvaluationContext, TeamDirectory, Verdict } from "./types.js";
