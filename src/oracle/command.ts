/**
 * Oracle backed by an external command's exit status:
 *   0 good, 125 skip, 129 skip-range, other 1..127 bad, anything else aborts the run.
 * The command inherits stdio and runs without a timeout.
 */

import { spawnSync } from "child_process";
import { OracleContractViolationError } from "../errors.js";
import { logStructured } from "../log.js";
import type { Oracle } from "./outcome.js";

export const DEFAULT_SKIP_EXIT_CODE = 125;
export const DEFAULT_SKIP_RANGE_EXIT_CODE = 129;
export const DEFAULT_RANGE_NAME = "default";

export interface ExitCodePolicy {
  skip: number;
  skipRange: number;
  rangeName: string;
}

export const DEFAULT_EXIT_CODE_POLICY: ExitCodePolicy = {
  skip: DEFAULT_SKIP_EXIT_CODE,
  skipRange: DEFAULT_SKIP_RANGE_EXIT_CODE,
  rangeName: DEFAULT_RANGE_NAME,
};

export function classifyExitCode(
  status: number | null,
  policy: ExitCodePolicy = DEFAULT_EXIT_CODE_POLICY,
): string {
  if (status === 0) return "good";
  if (status === policy.skip) return "skip";
  if (status === policy.skipRange) return `skip ${policy.rangeName}`;
  if (status !== null && status >= 1 && status <= 127) return "bad";
  throw new OracleContractViolationError(
    status,
    status === null ? "command was killed by a signal" : `command exited with ${status}`,
  );
}

export interface CommandOracleOptions {
  cwd?: string;
  policy?: ExitCodePolicy;
}

export function commandOracle(argv: string[], options: CommandOracleOptions = {}): Oracle {
  const [cmd, ...args] = argv;
  if (cmd === undefined) throw new OracleContractViolationError(undefined, "no command given");
  return () => {
    const out = spawnSync(cmd, args, { cwd: options.cwd, stdio: "inherit" });
    if (out.error) {
      throw new OracleContractViolationError(undefined, `cannot run ${cmd}: ${out.error.message}`);
    }
    logStructured("oracle_exit", { argv, status: out.status, signal: out.signal });
    return classifyExitCode(out.status, options.policy);
  };
}
