/**
 * pbisect argv parsing. Flags come before positional arguments; `--` ends flag parsing.
 */

import type { PatchPick } from "../session/session.js";
import { parsePatchset } from "../refs/names.js";

export const USAGE = `Usage:
  pbisect start <bad> [<good>...]
  pbisect good [<rev>]
  pbisect bad [<rev>]
  pbisect skip [<rev>] [--name <range>] [--patchset <h1,h2>]
  pbisect next
  pbisect status
  pbisect run [--range-name <range>] <cmd> [args...]
  pbisect env [--pick <rev>]... [--try-pick <rev>]... [--] <cmd> [args...]
  pbisect replay <file>
  pbisect log
  pbisect clear-range <range> [--patchset <h1,h2>]
  pbisect recover
  pbisect reset`;

export type CliCommand =
  | { name: "start"; bad: string; goods: string[] }
  | { name: "good"; rev: string }
  | { name: "bad"; rev: string }
  | { name: "skip"; rev: string; rangeName: string | null; patchset: string[] | null }
  | { name: "next" }
  | { name: "status" }
  | { name: "run"; argv: string[]; rangeName: string | null }
  | { name: "env"; picks: PatchPick[]; argv: string[] }
  | { name: "replay"; file: string }
  | { name: "log" }
  | { name: "clear-range"; rangeName: string; patchset: string[] | null }
  | { name: "recover" }
  | { name: "reset" }
  | { name: "help" };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

interface Split {
  flags: Map<string, string[]>;
  positional: string[];
}

/**
 * Collects `--flag value` pairs until the first positional argument (when `stopAtPositional`)
 * or `--`. Unknown flags are usage errors.
 */
function splitArgs(args: string[], known: string[], stopAtPositional: boolean): Split {
  const flags = new Map<string, string[]>();
  const positional: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const a = args[i];
    if (a === undefined) continue;
    if (a === "--") {
      positional.push(...args.slice(i + 1));
      break;
    }
    if (a.startsWith("--")) {
      if (stopAtPositional && positional.length > 0) {
        positional.push(...args.slice(i));
        break;
      }
      if (!known.includes(a)) throw new UsageError(`unknown option ${a}`);
      const value = args[i + 1];
      if (value === undefined) throw new UsageError(`${a} needs a value`);
      flags.set(a, [...(flags.get(a) ?? []), value]);
      i++;
      continue;
    }
    positional.push(a);
    if (stopAtPositional) {
      positional.push(...args.slice(i + 1));
      break;
    }
  }
  return { flags, positional };
}

function single(split: Split, name: string): string | null {
  const values = split.flags.get(name);
  if (values === undefined) return null;
  if (values.length > 1) throw new UsageError(`${name} given more than once`);
  return values[0] ?? null;
}

function atMostOne(positional: string[], what: string): string | undefined {
  if (positional.length > 1) throw new UsageError(`expected at most one ${what}`);
  return positional[0];
}

function noArgs(name: string, rest: string[]): void {
  if (rest.length > 0) throw new UsageError(`${name} takes no arguments`);
}

/** Order-preserving picks from interleaved --pick/--try-pick flags. */
function collectPicks(args: string[]): { picks: PatchPick[]; rest: string[] } {
  const picks: PatchPick[] = [];
  let i = 0;
  for (; i < args.length; i += 2) {
    const flag = args[i];
    if (flag === "--") {
      i++;
      break;
    }
    if (flag !== "--pick" && flag !== "--try-pick") break;
    const rev = args[i + 1];
    if (rev === undefined) throw new UsageError(`${flag} needs a value`);
    picks.push({ rev, mode: flag === "--pick" ? "pick" : "try-pick" });
  }
  return { picks, rest: args.slice(i) };
}

export function parseCommand(args: string[]): CliCommand {
  const [name, ...rest] = args;
  switch (name) {
    case undefined:
    case "help":
    case "--help":
    case "-h":
      return { name: "help" };
    case "start": {
      const [bad, ...goods] = splitArgs(rest, [], false).positional;
      if (bad === undefined) throw new UsageError("start needs a bad revision");
      return { name: "start", bad, goods };
    }
    case "good":
    case "bad": {
      const rev = atMostOne(splitArgs(rest, [], false).positional, "revision") ?? "HEAD";
      return { name, rev };
    }
    case "skip": {
      const split = splitArgs(rest, ["--name", "--patchset"], false);
      const patchset = single(split, "--patchset");
      return {
        name: "skip",
        rev: atMostOne(split.positional, "revision") ?? "HEAD",
        rangeName: single(split, "--name"),
        patchset: patchset === null ? null : parsePatchset(patchset),
      };
    }
    case "run": {
      const split = splitArgs(rest, ["--range-name"], true);
      if (split.positional.length === 0) throw new UsageError("run needs a command");
      return { name: "run", argv: split.positional, rangeName: single(split, "--range-name") };
    }
    case "env": {
      const { picks, rest: argv } = collectPicks(rest);
      if (argv.length === 0) throw new UsageError("env needs a command");
      return { name: "env", picks, argv };
    }
    case "replay": {
      const [file, ...extra] = rest;
      if (file === undefined || extra.length > 0) throw new UsageError("replay needs one file");
      return { name: "replay", file };
    }
    case "clear-range": {
      const split = splitArgs(rest, ["--patchset"], false);
      const [rangeName, ...extra] = split.positional;
      if (rangeName === undefined || extra.length > 0) {
        throw new UsageError("clear-range needs one range name");
      }
      const patchset = single(split, "--patchset");
      return {
        name: "clear-range",
        rangeName,
        patchset: patchset === null ? null : parsePatchset(patchset),
      };
    }
    case "next":
    case "status":
    case "log":
    case "recover":
    case "reset":
      noArgs(name, rest);
      return { name };
    default:
      throw new UsageError(`unknown command "${name}"`);
  }
}
