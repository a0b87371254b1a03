/**
 * In-process commit DAG with file trees and a reference store.
 * Patches apply file-by-file: a changed path applies when the working copy still holds the
 * parent's version (or already holds the commit's version) and conflicts otherwise.
 */

import { createHash } from "crypto";
import { RefConflictError, UnresolvableReferenceError } from "../errors.js";
import type { Commit, CommitNode, Repository } from "./types.js";
import { shortHash } from "./types.js";

type Tree = Map<string, string>;

interface StoredCommit {
  parents: Commit[];
  tree: Tree;
  message: string;
}

export type FileChanges = Record<string, string | null>;

export interface MemoryRepositoryOptions {
  gitDir?: string;
}

function treeEquals(a: Tree, b: Tree): boolean {
  if (a.size !== b.size) return false;
  for (const [k, v] of a) {
    if (b.get(k) !== v) return false;
  }
  return true;
}

function hashCommit(parents: Commit[], tree: Tree, message: string): Commit {
  const files = [...tree.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return createHash("sha1")
    .update(JSON.stringify({ parents, files, message }), "utf8")
    .digest("hex");
}

export class MemoryRepository implements Repository {
  private commits = new Map<Commit, StoredCommit>();
  private refs = new Map<string, Commit>();
  private checkpointBranches = new Map<Commit, string | null>();
  private current: Commit | null = null;
  private branch: string | null = null;
  private worktree: Tree = new Map();
  private readonly dir: string;

  constructor(options: MemoryRepositoryOptions = {}) {
    this.dir = options.gitDir ?? ".git";
  }

  /**
   * Creates a commit on top of `parents` (default: the current HEAD) whose tree is the first
   * parent's tree with `changes` applied; null deletes a path. Does not move HEAD.
   */
  commit(message: string, changes: FileChanges = {}, parents?: Commit[]): Commit {
    const parentList = parents ?? (this.current === null ? [] : [this.current]);
    for (const p of parentList) this.stored(p);
    const first = parentList[0];
    const tree: Tree = first === undefined ? new Map() : new Map(this.stored(first).tree);
    for (const [path, content] of Object.entries(changes)) {
      if (content === null) tree.delete(path);
      else tree.set(path, content);
    }
    const hash = hashCommit(parentList, tree, message);
    if (!this.commits.has(hash)) {
      this.commits.set(hash, { parents: [...parentList], tree, message });
    }
    return hash;
  }

  /** Like `commit`, then moves the current branch (or detached HEAD) onto it with a clean tree. */
  commitOnHead(message: string, changes: FileChanges = {}): Commit {
    const hash = this.commit(message, changes);
    this.current = hash;
    this.worktree = new Map(this.stored(hash).tree);
    if (this.branch !== null) this.refs.set(this.branch, hash);
    return hash;
  }

  attachBranch(name: string): void {
    const head = this.head();
    this.refs.set(name, head);
    this.branch = name;
  }

  currentBranch(): string | null {
    return this.branch;
  }

  readFile(path: string): string | null {
    return this.worktree.get(path) ?? null;
  }

  writeFile(path: string, content: string | null): void {
    if (content === null) this.worktree.delete(path);
    else this.worktree.set(path, content);
  }

  files(): Record<string, string> {
    return Object.fromEntries([...this.worktree.entries()].sort(([a], [b]) => (a < b ? -1 : 1)));
  }

  treeOf(commit: Commit): Record<string, string> {
    return Object.fromEntries(this.stored(commit).tree);
  }

  isClean(): boolean {
    return this.current !== null && treeEquals(this.worktree, this.stored(this.current).tree);
  }

  ancestry(a: Commit, b: Commit): boolean {
    this.stored(a);
    const seen = new Set<Commit>();
    const stack = [b];
    while (stack.length > 0) {
      const c = stack.pop();
      if (c === undefined || seen.has(c)) continue;
      if (c === a) return true;
      seen.add(c);
      stack.push(...this.stored(c).parents);
    }
    return false;
  }

  parents(commit: Commit): Commit[] {
    return [...this.stored(commit).parents];
  }

  resolve(name: string): Commit {
    const found = this.tryResolve(name);
    if (found === null) throw new UnresolvableReferenceError(name);
    return found;
  }

  tryResolve(name: string): Commit | null {
    if (name === "HEAD") return this.current;
    const ref = this.refs.get(name);
    if (ref !== undefined) return ref;
    if (this.commits.has(name)) return name;
    if (/^[0-9a-f]{4,}$/.test(name)) {
      const matches = [...this.commits.keys()].filter((c) => c.startsWith(name));
      if (matches.length === 1) return matches[0] ?? null;
    }
    return null;
  }

  setRef(name: string, commit: Commit, expected?: Commit | null): void {
    this.stored(commit);
    const actual = this.refs.get(name) ?? null;
    if (expected !== undefined && actual !== expected) {
      throw new RefConflictError(name, expected, actual);
    }
    this.refs.set(name, commit);
  }

  deleteRef(name: string): void {
    this.refs.delete(name);
  }

  listRefs(prefix: string): Map<string, Commit> {
    const root = prefix.replace(/\/+$/, "");
    const names = [...this.refs.keys()]
      .filter((n) => n === root || n.startsWith(root + "/"))
      .sort();
    const out = new Map<string, Commit>();
    for (const n of names) {
      const c = this.refs.get(n);
      if (c !== undefined) out.set(n, c);
    }
    return out;
  }

  revList(tips: Commit[], exclude: Commit[]): CommitNode[] {
    const excluded = new Set<Commit>();
    const stack = [...exclude];
    while (stack.length > 0) {
      const c = stack.pop();
      if (c === undefined || excluded.has(c)) continue;
      excluded.add(c);
      stack.push(...this.stored(c).parents);
    }

    const order: Commit[] = [];
    const visited = new Set<Commit>();
    const visit = (start: Commit): void => {
      const work: { commit: Commit; expanded: boolean }[] = [{ commit: start, expanded: false }];
      while (work.length > 0) {
        const top = work.pop();
        if (top === undefined) break;
        if (top.expanded) {
          order.push(top.commit);
          continue;
        }
        if (visited.has(top.commit) || excluded.has(top.commit)) continue;
        visited.add(top.commit);
        work.push({ commit: top.commit, expanded: true });
        const parents = this.stored(top.commit).parents;
        for (let i = parents.length - 1; i >= 0; i--) {
          const p = parents[i];
          if (p !== undefined) work.push({ commit: p, expanded: false });
        }
      }
    };
    for (const tip of tips) visit(tip);

    return order.reverse().map((commit) => ({ commit, parents: this.parents(commit) }));
  }

  head(): Commit {
    if (this.current === null) throw new UnresolvableReferenceError("HEAD");
    return this.current;
  }

  checkout(commit: Commit): void {
    this.worktree = new Map(this.stored(commit).tree);
    this.current = commit;
    this.branch = null;
  }

  snapshotCheckpoint(): Commit {
    const head = this.head();
    const message = `pbisect checkpoint of ${head}`;
    const tree: Tree = new Map(this.worktree);
    const id = hashCommit([head], tree, message);
    this.commits.set(id, { parents: [head], tree, message });
    this.checkpointBranches.set(id, this.branch);
    return id;
  }

  restoreCheckpoint(checkpoint: Commit): void {
    const stored = this.stored(checkpoint);
    const origin = stored.parents[0];
    if (origin === undefined) throw new UnresolvableReferenceError(`${checkpoint}^1`);
    this.worktree = new Map(stored.tree);
    this.current = origin;
    this.branch = this.checkpointBranches.get(checkpoint) ?? null;
  }

  applyPatch(commit: Commit): boolean {
    const target = this.stored(commit);
    const lines = target.parents.length === 0 ? [null] : target.parents;
    const entry = new Map(this.worktree);
    for (const parent of lines) {
      const base: Tree = parent === null ? new Map() : this.stored(parent).tree;
      if (this.applyDiff(base, target.tree)) return true;
      this.worktree = new Map(entry);
    }
    return false;
  }

  describe(commit: Commit): string {
    const subject = this.stored(commit).message.split("\n")[0] ?? "";
    return `${shortHash(commit)} ${subject}`.trimEnd();
  }

  gitDir(): string {
    return this.dir;
  }

  private applyDiff(base: Tree, target: Tree): boolean {
    const paths = new Set([...base.keys(), ...target.keys()]);
    for (const path of [...paths].sort()) {
      const from = base.get(path);
      const to = target.get(path);
      if (from === to) continue;
      const here = this.worktree.get(path);
      if (here === to) continue;
      if (here !== from) return false;
      if (to === undefined) this.worktree.delete(path);
      else this.worktree.set(path, to);
    }
    return true;
  }

  private stored(commit: Commit): StoredCommit {
    const c = this.commits.get(commit);
    if (c === undefined) throw new UnresolvableReferenceError(commit);
    return c;
  }
}
