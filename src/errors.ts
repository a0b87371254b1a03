/**
 * Error taxonomy. Every engine failure carries a stable code so the CLI can map it to an exit status.
 */

export type BisectErrorCode =
  | "UNRESOLVABLE_REFERENCE"
  | "PATCH_APPLICATION_CONFLICT"
  | "INCONSISTENT_HISTORY"
  | "ORACLE_CONTRACT_VIOLATION"
  | "INTERRUPTED_RESTORE"
  | "REF_CONFLICT"
  | "INVALID_RANGE_NAME"
  | "GIT_COMMAND_FAILED"
  | "CONFIG_INVALID"
  | "AUDIT_LOG_INVALID";

export class BisectError extends Error {
  readonly code: BisectErrorCode;

  constructor(code: BisectErrorCode, message: string) {
    super(message);
    this.name = "BisectError";
    this.code = code;
  }
}

export class UnresolvableReferenceError extends BisectError {
  readonly ref: string;

  constructor(ref: string) {
    super("UNRESOLVABLE_REFERENCE", `cannot resolve "${ref}"`);
    this.name = "UnresolvableReferenceError";
    this.ref = ref;
  }
}

export class PatchApplicationConflictError extends BisectError {
  readonly commit: string;

  constructor(commit: string) {
    super("PATCH_APPLICATION_CONFLICT", `${commit} does not apply on any parent line`);
    this.name = "PatchApplicationConflictError";
    this.commit = commit;
  }
}

export class InconsistentHistoryError extends BisectError {
  readonly good: string;
  readonly bad: string;

  constructor(good: string, bad: string) {
    super("INCONSISTENT_HISTORY", `good commit ${good} descends from bad commit ${bad}`);
    this.name = "InconsistentHistoryError";
    this.good = good;
    this.bad = bad;
  }
}

export class OracleContractViolationError extends BisectError {
  readonly answer: unknown;

  constructor(answer: unknown, detail?: string) {
    super(
      "ORACLE_CONTRACT_VIOLATION",
      detail ?? `oracle returned unrecognized outcome ${JSON.stringify(String(answer))}`,
    );
    this.name = "OracleContractViolationError";
    this.answer = answer;
  }
}

export class InterruptedRestoreError extends BisectError {
  readonly signal: NodeJS.Signals;

  constructor(signal: NodeJS.Signals) {
    super("INTERRUPTED_RESTORE", `interrupted by ${signal}; working tree was restored first`);
    this.name = "InterruptedRestoreError";
    this.signal = signal;
  }
}

export class RefConflictError extends BisectError {
  readonly ref: string;

  constructor(ref: string, expected: string | null, actual: string | null) {
    super(
      "REF_CONFLICT",
      `${ref} expected ${expected ?? "<absent>"} but found ${actual ?? "<absent>"}`,
    );
    this.name = "RefConflictError";
    this.ref = ref;
  }
}

export class InvalidRangeNameError extends BisectError {
  constructor(name: string) {
    super("INVALID_RANGE_NAME", `"${name}" is not a valid skip range name`);
    this.name = "InvalidRangeNameError";
  }
}

export class GitCommandError extends BisectError {
  readonly args: string[];
  readonly stderr: string;

  constructor(args: string[], status: number | null, stderr: string) {
    super(
      "GIT_COMMAND_FAILED",
      `git ${args.join(" ")} exited with ${status === null ? "a signal" : status}: ${stderr.trim()}`,
    );
    this.name = "GitCommandError";
    this.args = args;
    this.stderr = stderr;
  }
}

export class ConfigError extends BisectError {
  constructor(message: string) {
    super("CONFIG_INVALID", message);
    this.name = "ConfigError";
  }
}

export class AuditLogError extends BisectError {
  readonly line: number;

  constructor(line: number, text: string) {
    super("AUDIT_LOG_INVALID", `line ${line}: cannot replay "${text}"`);
    this.name = "AuditLogError";
    this.line = line;
  }
}

export function isBisectError(err: unknown): err is BisectError {
  return err instanceof BisectError;
}
