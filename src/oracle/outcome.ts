/**
 * Oracle contract: a no-argument call made with the tree checked out and patched, answering
 * "good", "bad", "skip" or "skip <range-name>".
 */

import { OracleContractViolationError } from "../errors.js";
import { isValidRangeName } from "../refs/names.js";

export type OracleOutcome =
  | { kind: "good" }
  | { kind: "bad" }
  | { kind: "skip" }
  | { kind: "skip-range"; name: string };

export type Oracle = () => string | Promise<string>;

const SKIP_RANGE_PREFIX = "skip ";

export function parseOutcome(answer: unknown): OracleOutcome {
  if (answer === "good") return { kind: "good" };
  if (answer === "bad") return { kind: "bad" };
  if (answer === "skip") return { kind: "skip" };
  if (typeof answer === "string" && answer.startsWith(SKIP_RANGE_PREFIX)) {
    const name = answer.slice(SKIP_RANGE_PREFIX.length);
    if (isValidRangeName(name)) return { kind: "skip-range", name };
  }
  throw new OracleContractViolationError(answer);
}

export function formatOutcome(outcome: OracleOutcome): string {
  return outcome.kind === "skip-range" ? `${SKIP_RANGE_PREFIX}${outcome.name}` : outcome.kind;
}

/** Calls the oracle; a throw or an unrecognized answer becomes OracleContractViolationError. */
export async function consultOracle(oracle: Oracle): Promise<OracleOutcome> {
  let answer: unknown;
  try {
    answer = await oracle();
  } catch (err) {
    if (err instanceof OracleContractViolationError) throw err;
    const msg = err instanceof Error ? err.message : String(err);
    throw new OracleContractViolationError(undefined, `oracle failed: ${msg}`);
  }
  return parseOutcome(answer);
}
