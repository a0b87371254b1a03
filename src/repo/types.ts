/** Full hex object name of a commit. */
export type Commit = string;

export interface CommitNode {
  commit: Commit;
  parents: Commit[];
}

/**
 * Primitives over a commit DAG and its reference store.
 * References are the only persistent state the engine keeps.
 */
export interface Repository {
  /** True iff `a` is an ancestor of, or equal to, `b`. */
  ancestry(a: Commit, b: Commit): boolean;
  parents(commit: Commit): Commit[];
  /** Throws UnresolvableReferenceError when `name` does not name a commit. */
  resolve(name: string): Commit;
  tryResolve(name: string): Commit | null;
  /**
   * `expected` turns the write into a compare-and-swap: a commit means the ref must
   * currently point there, null means it must not exist.
   */
  setRef(name: string, commit: Commit, expected?: Commit | null): void;
  deleteRef(name: string): void;
  /** Refs equal to `prefix` or below it as a whole path segment. */
  listRefs(prefix: string): Map<string, Commit>;
  /** Reachable from `tips` and not from `exclude`, in topological order with children first. */
  revList(tips: Commit[], exclude: Commit[]): CommitNode[];
  head(): Commit;
  /** Discards uncommitted changes. */
  checkout(commit: Commit): void;
  /** No tracked modifications and no untracked, non-ignored files. */
  isClean(): boolean;
  snapshotCheckpoint(): Commit;
  restoreCheckpoint(checkpoint: Commit): void;
  applyPatch(commit: Commit): boolean;
  describe(commit: Commit): string;
  gitDir(): string;
}

export function shortHash(commit: Commit): string {
  return commit.slice(0, 10);
}
