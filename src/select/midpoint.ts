/**
 * Ancestry-count bisection over a region listed children-first.
 */

import type { Commit, CommitNode } from "../repo/types.js";

export interface Midpoint {
  commit: Commit;
  /** Candidates that are ancestors of, or equal to, the midpoint. */
  weight: number;
  total: number;
}

/**
 * Weight of each candidate = candidates reachable from it through the region (itself included);
 * skipped commits are walked through but not counted. Returns the candidate maximizing
 * min(weight, total - weight), the earliest in region order on ties.
 */
export function findMidpoint(region: CommitNode[], candidates: ReadonlySet<Commit>): Midpoint | null {
  const parentsOf = new Map<Commit, Commit[]>();
  for (const n of region) parentsOf.set(n.commit, n.parents);
  const total = region.filter((n) => candidates.has(n.commit)).length;
  const weights = regionWeights(region, parentsOf, candidates);

  let best: Midpoint | null = null;
  let bestScore = -1;
  for (const node of region) {
    if (!candidates.has(node.commit)) continue;
    const weight = weights.get(node.commit) ?? 0;
    const score = Math.min(weight, total - weight);
    if (score > bestScore) {
      best = { commit: node.commit, weight, total };
      bestScore = score;
    }
  }
  return best;
}

/**
 * Parents-first pass. A commit with one parent in the region reaches exactly that parent's set
 * plus itself, so only merges need a walk.
 */
function regionWeights(
  region: CommitNode[],
  parentsOf: Map<Commit, Commit[]>,
  candidates: ReadonlySet<Commit>,
): Map<Commit, number> {
  const weights = new Map<Commit, number>();
  for (let i = region.length - 1; i >= 0; i--) {
    const node = region[i];
    if (node === undefined) continue;
    const own = candidates.has(node.commit) ? 1 : 0;
    const inside = node.parents.filter((p) => parentsOf.has(p));
    const only = inside.length === 1 ? inside[0] : undefined;
    const parentWeight = only === undefined ? undefined : weights.get(only);
    if (inside.length === 0) {
      weights.set(node.commit, own);
    } else if (parentWeight !== undefined) {
      weights.set(node.commit, parentWeight + own);
    } else {
      weights.set(node.commit, countReachable(node.commit, parentsOf, candidates));
    }
  }
  return weights;
}

function countReachable(
  start: Commit,
  parentsOf: Map<Commit, Commit[]>,
  candidates: ReadonlySet<Commit>,
): number {
  const seen = new Set<Commit>();
  const stack = [start];
  let count = 0;
  while (stack.length > 0) {
    const c = stack.pop();
    if (c === undefined || seen.has(c)) continue;
    seen.add(c);
    if (candidates.has(c)) count++;
    for (const p of parentsOf.get(c) ?? []) {
      if (parentsOf.has(p)) stack.push(p);
    }
  }
  return count;
}

/** Worst-case trials left when `total` candidates (bad included) remain. */
export function estimateSteps(total: number): number {
  return total <= 1 ? 0 : Math.ceil(Math.log2(total));
}
