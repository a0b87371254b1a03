export * from "./errors.js";
export { log, warn, logStructured } from "./log.js";
export type { Commit, CommitNode, Repository } from "./repo/types.js";
export { shortHash } from "./repo/types.js";
export { GitRepository, findRepoRoot } from "./repo/git.js";
export { RefNames, DEFAULT_REF_PREFIX, isValidRangeName, type PatchsetId } from "./refs/names.js";
export { SkipRangeTracker, plainSkipName } from "./skip/tracker.js";
export { CommitSelector, DEFAULT_MAX_PATCHSET } from "./select/selector.js";
export type { Selection, PatchsetGrowth, SelectorOptions } from "./select/types.js";
export { findMidpoint, estimateSteps, type Midpoint } from "./select/midpoint.js";
export {
  parseOutcome,
  formatOutcome,
  consultOracle,
  type Oracle,
  type OracleOutcome,
} from "./oracle/outcome.js";
export {
  commandOracle,
  classifyExitCode,
  DEFAULT_EXIT_CODE_POLICY,
  type ExitCodePolicy,
} from "./oracle/command.js";
export { AuditLog, parseAuditLog, formatEntry, type AuditEntry } from "./audit/log.js";
export { TrialExecutor, type TrialReport, type PatchResult } from "./trial/executor.js";
export { DecisionRecorder } from "./trial/recorder.js";
export { nonCancellable, SignalGuard } from "./trial/guard.js";
export { BisectSession, type SessionStatus, type PatchPick } from "./session/session.js";
export { loadPbisectConfig, parseConfig, defaultConfig, type PbisectConfig } from "./config/pbisectYaml.js";
