/**
 * Picks the next commit to test. State is read from references on every call, so two calls
 * without an intervening reference write agree.
 */

import { InconsistentHistoryError } from "../errors.js";
import { logStructured } from "../log.js";
import type { RefNames } from "../refs/names.js";
import type { Commit, CommitNode, Repository } from "../repo/types.js";
import type { SkipRangeTracker } from "../skip/tracker.js";
import { estimateSteps, findMidpoint } from "./midpoint.js";
import type { PatchsetGrowth, Selection, SelectorOptions } from "./types.js";

export const DEFAULT_MAX_PATCHSET = 16;

/** Region commits equal to or descending from any of `roots`. */
function descendantsWithin(region: CommitNode[], roots: ReadonlySet<Commit>): Set<Commit> {
  const out = new Set<Commit>();
  for (let i = region.length - 1; i >= 0; i--) {
    const node = region[i];
    if (node === undefined) continue;
    if (roots.has(node.commit) || node.parents.some((p) => out.has(p))) out.add(node.commit);
  }
  return out;
}

export class CommitSelector {
  private readonly initial: Commit[];
  private readonly maxPatchset: number;
  private lastPatchset: Commit[];

  constructor(
    private readonly repo: Repository,
    private readonly tracker: SkipRangeTracker,
    private readonly names: RefNames,
    options: SelectorOptions = {},
  ) {
    this.initial = [...(options.initialPatchset ?? [])];
    this.maxPatchset = options.maxPatchset ?? DEFAULT_MAX_PATCHSET;
    this.lastPatchset = [...this.initial];
  }

  /** Patchset in effect for the most recent selection. */
  get activePatchset(): Commit[] {
    return [...this.lastPatchset];
  }

  bad(): Commit {
    return this.repo.resolve(this.names.bad());
  }

  goods(): Commit[] {
    const out: Commit[] = [];
    for (const [ref, commit] of this.repo.listRefs(this.names.prefix)) {
      if (this.names.parseGood(ref) !== null) out.push(commit);
    }
    return out;
  }

  /** A good commit at or below bad makes the partition contradictory. */
  checkConsistency(bad: Commit, goods: Commit[]): void {
    for (const good of goods) {
      if (this.repo.ancestry(bad, good)) throw new InconsistentHistoryError(good, bad);
    }
  }

  next(): Commit | null {
    const selection = this.select();
    return selection.kind === "candidate" ? selection.commit : null;
  }

  select(): Selection {
    const bad = this.bad();
    const goods = this.goods();
    this.checkConsistency(bad, goods);

    const region = this.repo.revList([bad], goods);
    const inRegion = new Set(region.map((n) => n.commit));
    const growth: PatchsetGrowth[] = [];
    let patchset = [...this.initial];

    for (;;) {
      this.lastPatchset = patchset;
      const skipped = this.tracker.enclosed(patchset, region);
      // Commits holding a grown parent were already judged untestable without it.
      const patched = descendantsWithin(region, new Set(growth.map((g) => g.commit)));
      const candidates = new Set<Commit>();
      for (const n of region) {
        if (n.commit === bad || (!skipped.has(n.commit) && !patched.has(n.commit))) {
          candidates.add(n.commit);
        }
      }

      const mid = findMidpoint(region, candidates);
      if (mid !== null && mid.commit !== bad) {
        logStructured("candidate_selected", {
          commit: mid.commit,
          weight: mid.weight,
          total: mid.total,
          patchset,
        });
        return {
          kind: "candidate",
          commit: mid.commit,
          patchset: [...patchset],
          growth,
          remaining: mid.total,
          steps: estimateSteps(mid.total),
        };
      }

      const parents = this.repo.parents(bad);
      const goodParent = parents.length === 0 ? null : parents.find((p) => !inRegion.has(p));
      if (goodParent !== undefined) {
        logStructured("first_bad_found", { commit: bad, goodParent });
        return { kind: "found", firstBad: bad, goodParent, patchset: [...patchset] };
      }

      const ranges: string[] = [];
      const added: PatchsetGrowth[] = [];
      let extended = [...patchset];
      for (const parent of parents) {
        const parentRanges = skipped.get(parent) ?? [];
        for (const r of parentRanges) {
          if (!ranges.includes(r)) ranges.push(r);
        }
        if (extended.includes(parent) || extended.length >= this.maxPatchset) continue;
        extended = [parent, ...extended];
        added.push({ commit: parent, ranges: parentRanges });
      }

      if (added.length === 0) {
        logStructured("search_exhausted", { bad, patchset, ranges });
        return { kind: "exhausted", bad, patchset: [...patchset], growth, ranges };
      }
      for (const g of added) {
        logStructured("patchset_grown", { commit: g.commit, ranges: g.ranges });
      }
      growth.push(...added);
      patchset = extended;
    }
  }
}
