/**
 * Append-only audit log. `# ` lines are annotations for humans; every other line is a
 * replayable command.
 */

import { appendFileSync, existsSync, mkdirSync, readFileSync, rmSync } from "fs";
import { dirname } from "path";
import { AuditLogError } from "../errors.js";
import { formatPatchset, isValidRangeName, parsePatchset } from "../refs/names.js";
import type { Commit } from "../repo/types.js";

export const COMMAND = "pbisect";
export const DEFAULT_LOG_FILE = "PBISECT_LOG";

const HASH_RE = /^[0-9a-f]{4,64}$/;

export type AuditEntry =
  | { kind: "good"; commit: Commit }
  | { kind: "bad"; commit: Commit }
  | { kind: "skip"; commit: Commit; name: string; patchset: Commit[] };

export function formatEntry(entry: AuditEntry): string {
  if (entry.kind !== "skip") return `${COMMAND} ${entry.kind} ${entry.commit}`;
  const parts = [COMMAND, "skip", entry.commit, "--name", entry.name];
  if (entry.patchset.length > 0) parts.push("--patchset", formatPatchset(entry.patchset));
  return parts.join(" ");
}

function parseLine(text: string): AuditEntry | null {
  const tokens = text.trim().split(/\s+/);
  const [command, verb, commit, ...rest] = tokens;
  if (command !== COMMAND || commit === undefined || !HASH_RE.test(commit)) return null;
  if (verb === "good" || verb === "bad") {
    return rest.length === 0 ? { kind: verb, commit } : null;
  }
  if (verb !== "skip") return null;
  let name: string | null = null;
  let patchset: Commit[] = [];
  for (let i = 0; i < rest.length; i += 2) {
    const flag = rest[i];
    const value = rest[i + 1];
    if (value === undefined) return null;
    if (flag === "--name") name = value;
    else if (flag === "--patchset") patchset = parsePatchset(value);
    else return null;
  }
  if (name === null || !isValidRangeName(name)) return null;
  if (!patchset.every((c) => HASH_RE.test(c))) return null;
  return { kind: "skip", commit, name, patchset };
}

/** Replayable entries in log order. Throws AuditLogError on a command line it cannot read. */
export function parseAuditLog(text: string): AuditEntry[] {
  const out: AuditEntry[] = [];
  const lines = text.split("\n");
  for (let i = 0; i < lines.length; i++) {
    const line = (lines[i] ?? "").trim();
    if (line === "" || line.startsWith("#")) continue;
    const entry = parseLine(line);
    if (entry === null) throw new AuditLogError(i + 1, line);
    out.push(entry);
  }
  return out;
}

export class AuditLog {
  constructor(readonly path: string) {}

  append(lines: string[]): void {
    if (lines.length === 0) return;
    mkdirSync(dirname(this.path), { recursive: true });
    appendFileSync(this.path, lines.map((l) => l + "\n").join(""), "utf8");
  }

  annotate(text: string): void {
    this.append(text.split("\n").map((l) => `# ${l}`));
  }

  /** Writes the human summary and the replayable command as one append. */
  record(entry: AuditEntry, description: string): void {
    const label = entry.kind === "skip" ? `skip ${entry.name}` : entry.kind;
    this.append([`# ${label}: [${entry.commit}] ${description}`.trimEnd(), formatEntry(entry)]);
  }

  read(): string {
    return existsSync(this.path) ? readFileSync(this.path, "utf8") : "";
  }

  entries(): AuditEntry[] {
    return parseAuditLog(this.read());
  }

  remove(): void {
    rmSync(this.path, { force: true });
  }
}
