import type { Commit } from "../repo/types.js";

/** A parent of bad prepended to the patchset, with the ranges it was found in. */
export interface PatchsetGrowth {
  commit: Commit;
  ranges: string[];
}

export type Selection =
  | {
      kind: "candidate";
      commit: Commit;
      patchset: Commit[];
      growth: PatchsetGrowth[];
      /** Untested candidates, bad included. */
      remaining: number;
      steps: number;
    }
  | {
      kind: "found";
      firstBad: Commit;
      /** Null when the first bad commit is a root commit. */
      goodParent: Commit | null;
      patchset: Commit[];
    }
  | {
      kind: "exhausted";
      bad: Commit;
      patchset: Commit[];
      growth: PatchsetGrowth[];
      ranges: string[];
    };

export interface SelectorOptions {
  initialPatchset?: Commit[];
  maxPatchset?: number;
}
