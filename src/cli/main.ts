/**
 * pbisect CLI. Exit codes: 0 success, 1 engine error, 2 usage or config error.
 * Manual marks check out the next candidate when the working tree is clean.
 * `env` exits with its command's status, or the configured skip code when a --pick conflicts.
 */

import { spawnSync } from "child_process";
import { ConfigError, isBisectError, PatchApplicationConflictError } from "../errors.js";
import { loadPbisectConfig, type PbisectConfig } from "../config/pbisectYaml.js";
import { log, warn } from "../log.js";
import { commandOracle } from "../oracle/command.js";
import { findRepoRoot, GitRepository } from "../repo/git.js";
import type { Selection } from "../select/types.js";
import { BisectSession } from "../session/session.js";
import { parseCommand, USAGE, UsageError, type CliCommand } from "./args.js";
import { formatSelection, formatStatus } from "./format.js";

function runCommand(argv: string[], cwd: string): number {
  const [cmd, ...args] = argv;
  if (cmd === undefined) return 2;
  const out = spawnSync(cmd, args, { cwd, stdio: "inherit" });
  if (out.error) {
    warn(`cannot run ${cmd}: ${out.error.message}`);
    return 127;
  }
  return out.status ?? 128;
}

/** Keeps SIGINT from killing the process while a child runs; cleanup runs on the way out. */
async function withInterruptNotice<T>(fn: () => Promise<T>): Promise<T> {
  const onSignal = (signal: NodeJS.Signals): void => {
    warn(`${signal} received; restoring working tree`);
  };
  process.on("SIGINT", onSignal);
  try {
    return await fn();
  } finally {
    process.off("SIGINT", onSignal);
  }
}

async function execute(
  session: BisectSession,
  command: CliCommand,
  root: string,
  config: PbisectConfig,
): Promise<number> {
  const repo = session.repo;
  const show = (selection: Selection | null): void => {
    if (selection !== null) log(formatSelection(repo, selection));
  };
  const advance = (selection: Selection | null): void => {
    show(selection);
    session.checkoutCandidate(selection);
  };

  switch (command.name) {
    case "help":
      console.log(USAGE);
      return 0;
    case "start":
      advance(await session.start(command.bad, command.goods));
      return 0;
    case "good":
      advance(await session.markGood(command.rev));
      return 0;
    case "bad":
      advance(await session.markBad(command.rev));
      return 0;
    case "skip": {
      const patchset = command.patchset?.map((rev) => repo.resolve(rev));
      advance(await session.markSkip(command.rev, command.rangeName ?? undefined, patchset));
      return 0;
    }
    case "next": {
      const next = session.next();
      if (next !== null) console.log(next);
      return 0;
    }
    case "status":
      console.log(formatStatus(repo, session.status()));
      return 0;
    case "run": {
      const oracle = commandOracle(command.argv, {
        cwd: root,
        policy: {
          skip: config.exitCodes.skip,
          skipRange: config.exitCodes.skipRange,
          rangeName: command.rangeName ?? config.rangeName,
        },
      });
      const conclusion = await withInterruptNotice(() =>
        session.run(oracle, command.argv.join(" ")),
      );
      show(conclusion);
      return 0;
    }
    case "env":
      try {
        return await withInterruptNotice(() =>
          session.runWithPatches(command.picks, () => runCommand(command.argv, root)),
        );
      } catch (err) {
        if (err instanceof PatchApplicationConflictError) {
          warn(err.message);
          return config.exitCodes.skip;
        }
        throw err;
      }
    case "replay":
      log(`replayed ${await session.replay(command.file)} entries`);
      return 0;
    case "log":
      process.stdout.write(session.audit.read());
      return 0;
    case "clear-range": {
      const patchset = command.patchset?.map((rev) => repo.resolve(rev));
      await session.clearRange(command.rangeName, patchset);
      return 0;
    }
    case "recover":
      log(`restored ${await session.recover()} snapshot(s)`);
      return 0;
    case "reset":
      await session.reset();
      return 0;
  }
}

export async function runCli(args: string[], cwd: string = process.cwd()): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCommand(args);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    warn(err.message);
    console.error(USAGE);
    return 2;
  }
  if (command.name === "help") {
    console.log(USAGE);
    return 0;
  }

  const root = findRepoRoot(cwd);
  if (root === null) {
    warn("not inside a git repository");
    return 2;
  }

  try {
    const config = loadPbisectConfig(root);
    const session = new BisectSession(new GitRepository(root), config);
    return await execute(session, command, root, config);
  } catch (err) {
    if (err instanceof ConfigError) {
      warn(err.message);
      return 2;
    }
    if (isBisectError(err)) {
      warn(`${err.code}: ${err.message}`);
      return 1;
    }
    throw err;
  }
}
