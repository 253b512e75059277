export { runGate, describePolicy } from "./run/runGate.js";
export type { GateClient, GateDeps } from "./run/runGate.js";
export { evaluate, collapseReviews, NO_APPROVALS, StaticTeamDirectory } from "./decision/index.js";
export type { EvaluationContext, TeamDirectory, Verdict } from "./decision/index.js";
export { GitHubClient } from "./github/client.js";
export type { GitHubClientOptions, PlatformClient } from "./github/client.js";
export type { Commit, PullRequest, Review, ReviewState } from "./github/types.js";
export { parsePolicy } from "./policy/parsePolicy.js";
export { DEFAULT_POLICY } from "./policy/types.js";
export type { ApproverScope, Policy, TeamRef } from "./policy/types.js";
export { loadPolicy, parsePolicyYaml } from "./config/policyYaml.js";
export { readGateConfig } from "./config/env.js";
export type { GateConfig, RepoRef } from "./config/env.js";
export { report, reportError, exitCodeFor, EXIT_APPROVED, EXIT_NOT_APPROVED, EXIT_ERROR } from "./report/reporter.js";
export type { ExitCode } from "./report/reporter.js";
export * from "./errors.js";
export { ConsoleLogger, InMemoryLogger } from "./log.js";
export type { Logger, LogLevel } from "./log.js";
