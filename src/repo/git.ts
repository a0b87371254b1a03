/**
 * Repository adapter over the git CLI. Every call is a synchronous `git` subprocess run
 * from the repository root.
 */

import { spawnSync } from "child_process";
import { rmSync } from "fs";
import { join, resolve } from "path";
import { GitCommandError, RefConflictError, UnresolvableReferenceError } from "../errors.js";
import { logStructured } from "../log.js";
import type { Commit, CommitNode, Repository } from "./types.js";
import { shortHash } from "./types.js";

const ZERO_OID = "0000000000000000000000000000000000000000";
const CHECKPOINT_INDEX = "pbisect-checkpoint.index";
const CHECKPOINT_SUBJECT = "pbisect checkpoint";
const CHECKPOINT_HEAD_PREFIX = "head: ";
const IDENTITY = {
  GIT_AUTHOR_NAME: "pbisect",
  GIT_AUTHOR_EMAIL: "pbisect@localhost",
  GIT_COMMITTER_NAME: "pbisect",
  GIT_COMMITTER_EMAIL: "pbisect@localhost",
};

export interface GitResult {
  status: number | null;
  stdout: string;
  stderr: string;
}

interface RunOptions {
  env?: Record<string, string>;
  maxBuffer?: number;
}

/** `git rev-list --parents` output: one commit per line followed by its parents. */
export function parseRevList(stdout: string): CommitNode[] {
  const out: CommitNode[] = [];
  for (const line of stdout.split("\n")) {
    const parts = line.trim().split(/\s+/).filter(Boolean);
    const [commit, ...parents] = parts;
    if (commit === undefined) continue;
    out.push({ commit, parents });
  }
  return out;
}

/** `git for-each-ref --format="%(objectname) %(refname)"` output, restricted to whole-segment matches of `prefix`. */
export function parseRefList(stdout: string, prefix: string): Map<string, Commit> {
  const root = prefix.replace(/\/+$/, "");
  const out = new Map<string, Commit>();
  for (const line of stdout.split("\n")) {
    const m = line.trim().match(/^([0-9a-f]+)\s+(\S+)$/);
    if (!m) continue;
    const [, oid, name] = m;
    if (oid === undefined || name === undefined) continue;
    if (name !== root && !name.startsWith(root + "/")) continue;
    out.set(name, oid);
  }
  return out;
}

export function checkpointMessage(branch: string | null): string {
  return `${CHECKPOINT_SUBJECT}\n\n${CHECKPOINT_HEAD_PREFIX}${branch ?? "detached"}\n`;
}

/** Branch recorded by `checkpointMessage`, or null when HEAD was detached. */
export function parseCheckpointBranch(message: string): string | null {
  for (const line of message.split("\n")) {
    if (!line.startsWith(CHECKPOINT_HEAD_PREFIX)) continue;
    const value = line.slice(CHECKPOINT_HEAD_PREFIX.length).trim();
    return value.startsWith("refs/heads/") ? value : null;
  }
  return null;
}

export function findRepoRoot(cwd: string = process.cwd()): string | null {
  try {
    const out = spawnSync("git", ["rev-parse", "--show-toplevel"], {
      cwd,
      encoding: "utf8",
      maxBuffer: 64 * 1024,
    });
    if (out.status !== 0 || !out.stdout?.trim()) return null;
    return resolve(out.stdout.trim());
  } catch {
    return null;
  }
}

export class GitRepository implements Repository {
  readonly root: string;
  private ancestryCache = new Map<string, boolean>();
  private parentsCache = new Map<Commit, Commit[]>();
  private cachedGitDir: string | null = null;

  constructor(root: string) {
    this.root = resolve(root);
  }

  tryGit(args: string[], options: RunOptions = {}): GitResult {
    const out = spawnSync("git", args, {
      cwd: this.root,
      encoding: "utf8",
      maxBuffer: options.maxBuffer ?? 16 * 1024 * 1024,
      env: options.env ? { ...process.env, ...options.env } : process.env,
    });
    if (out.error) throw out.error;
    return { status: out.status, stdout: out.stdout ?? "", stderr: out.stderr ?? "" };
  }

  git(args: string[], options: RunOptions = {}): string {
    const out = this.tryGit(args, options);
    if (out.status !== 0) throw new GitCommandError(args, out.status, out.stderr);
    return out.stdout.trim();
  }

  ancestry(a: Commit, b: Commit): boolean {
    if (a === b) return true;
    const key = `${a}:${b}`;
    const cached = this.ancestryCache.get(key);
    if (cached !== undefined) return cached;
    const args = ["merge-base", "--is-ancestor", a, b];
    const out = this.tryGit(args);
    if (out.status !== 0 && out.status !== 1) {
      throw new GitCommandError(args, out.status, out.stderr);
    }
    const result = out.status === 0;
    this.ancestryCache.set(key, result);
    return result;
  }

  parents(commit: Commit): Commit[] {
    const cached = this.parentsCache.get(commit);
    if (cached !== undefined) return [...cached];
    const line = this.git(["log", "-1", "--format=%P", commit]);
    const parents = line.split(/\s+/).filter(Boolean);
    this.parentsCache.set(commit, parents);
    return [...parents];
  }

  resolve(name: string): Commit {
    const found = this.tryResolve(name);
    if (found === null) throw new UnresolvableReferenceError(name);
    return found;
  }

  tryResolve(name: string): Commit | null {
    const out = this.tryGit(["rev-parse", "--verify", "--quiet", `${name}^{commit}`]);
    if (out.status !== 0) return null;
    const oid = out.stdout.trim();
    return oid.length > 0 ? oid : null;
  }

  setRef(name: string, commit: Commit, expected?: Commit | null): void {
    const args = ["update-ref", name, commit];
    if (expected !== undefined) args.push(expected ?? ZERO_OID);
    const out = this.tryGit(args);
    if (out.status === 0) return;
    if (expected !== undefined) {
      throw new RefConflictError(name, expected, this.tryResolve(name));
    }
    throw new GitCommandError(args, out.status, out.stderr);
  }

  deleteRef(name: string): void {
    this.git(["update-ref", "-d", name]);
  }

  listRefs(prefix: string): Map<string, Commit> {
    const root = prefix.replace(/\/+$/, "");
    const stdout = this.git(["for-each-ref", "--format=%(objectname) %(refname)", root]);
    return parseRefList(stdout, root);
  }

  revList(tips: Commit[], exclude: Commit[]): CommitNode[] {
    if (tips.length === 0) return [];
    const args = ["rev-list", "--topo-order", "--parents", ...tips];
    if (exclude.length > 0) args.push("--not", ...exclude);
    const nodes = parseRevList(this.git(args, { maxBuffer: 256 * 1024 * 1024 }));
    for (const n of nodes) this.parentsCache.set(n.commit, n.parents);
    return nodes;
  }

  head(): Commit {
    return this.resolve("HEAD");
  }

  checkout(commit: Commit): void {
    this.git(["checkout", "-q", "-f", "--detach", commit]);
  }

  isClean(): boolean {
    return this.git(["status", "--porcelain", "--untracked-files=normal"]) === "";
  }

  snapshotCheckpoint(): Commit {
    const head = this.head();
    const symbolic = this.tryGit(["symbolic-ref", "-q", "HEAD"]);
    const branch = symbolic.status === 0 ? symbolic.stdout.trim() : null;
    const indexFile = join(this.gitDir(), CHECKPOINT_INDEX);
    const env = { ...IDENTITY, GIT_INDEX_FILE: indexFile };
    try {
      this.git(["read-tree", head], { env });
      this.git(["add", "-A"], { env });
      const tree = this.git(["write-tree"], { env });
      const checkpoint = this.git(["commit-tree", tree, "-p", head, "-m", checkpointMessage(branch)], { env });
      logStructured("checkpoint_created", { checkpoint, head, branch });
      return checkpoint;
    } finally {
      rmSync(indexFile, { force: true });
    }
  }

  /**
   * Detaches onto the checkpoint so no branch moves, drops untracked files it does not hold,
   * then resets HEAD and the index back to the original commit and reattaches the branch.
   */
  restoreCheckpoint(checkpoint: Commit): void {
    const origin = this.parents(checkpoint)[0];
    if (origin === undefined) throw new UnresolvableReferenceError(`${checkpoint}^1`);
    const branch = parseCheckpointBranch(this.git(["log", "-1", "--format=%B", checkpoint]));
    this.git(["checkout", "-q", "-f", "--detach", checkpoint]);
    this.git(["clean", "-q", "-f", "-d"]);
    this.git(["reset", "-q", origin]);
    if (branch !== null) this.git(["symbolic-ref", "HEAD", branch]);
    logStructured("checkpoint_restored", { checkpoint, origin, branch });
  }

  applyPatch(commit: Commit): boolean {
    const parents = this.parents(commit);
    const entryTree = this.git(["write-tree"]);
    const mainlines = parents.length > 1 ? parents.map((_, i) => String(i + 1)) : [null];
    for (const mainline of mainlines) {
      const args = ["cherry-pick", "--no-commit"];
      if (mainline !== null) args.push("-m", mainline);
      args.push(commit);
      const out = this.tryGit(args, { env: IDENTITY });
      if (out.status === 0) {
        logStructured("patch_applied", { commit, mainline });
        return true;
      }
      logStructured("patch_conflict", { commit, mainline });
      this.tryGit(["cherry-pick", "--quit"]);
      this.git(["read-tree", "--reset", "-u", entryTree]);
    }
    return false;
  }

  describe(commit: Commit): string {
    const subject = this.git(["log", "-1", "--format=%s", commit]);
    return `${shortHash(commit)} ${subject}`.trimEnd();
  }

  gitDir(): string {
    if (this.cachedGitDir === null) {
      this.cachedGitDir = resolve(this.git(["rev-parse", "--absolute-git-dir"]));
    }
    return this.cachedGitDir;
  }
}
