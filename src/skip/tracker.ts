/**
 * Named skip ranges, stored as marker references scoped to an exact patchset.
 * A commit lies within a range when some marker is an ancestor of it and it is an ancestor
 * of some marker; markers may be added in any topological order.
 */

import { assertRangeName, RefNames, type PatchsetId } from "../refs/names.js";
import type { Commit, CommitNode, Repository } from "../repo/types.js";
import { logStructured } from "../log.js";

export const PLAIN_SKIP_PREFIX = "skip-";

/** Range name used for a plain skip: a one-commit range named after the commit. */
export function plainSkipName(commit: Commit): string {
  return `${PLAIN_SKIP_PREFIX}${commit}`;
}

export class SkipRangeTracker {
  constructor(
    private readonly repo: Repository,
    private readonly names: RefNames,
  ) {}

  mark(patchset: PatchsetId, name: string, commit: Commit): void {
    assertRangeName(name);
    this.repo.setRef(this.names.marker(patchset, name, commit), commit);
    logStructured("skip_marked", { patchset: [...patchset], name, commit });
  }

  rangesFor(patchset: PatchsetId): Set<string> {
    const out = new Set<string>();
    for (const ref of this.repo.listRefs(this.names.markersRoot(patchset)).keys()) {
      const parsed = this.names.parseMarker(patchset, ref);
      if (parsed) out.add(parsed.name);
    }
    return out;
  }

  markersOf(patchset: PatchsetId, name: string): Set<Commit> {
    const out = new Set<Commit>();
    for (const [ref, target] of this.repo.listRefs(this.names.range(patchset, name))) {
      if (this.names.parseMarker(patchset, ref)) out.add(target);
    }
    return out;
  }

  contains(commit: Commit, markers: Iterable<Commit>): boolean {
    const list = [...markers];
    const below = list.some((m) => this.repo.ancestry(m, commit));
    return below && list.some((m) => this.repo.ancestry(commit, m));
  }

  clear(patchset: PatchsetId, name: string): void {
    for (const ref of this.repo.listRefs(this.names.range(patchset, name)).keys()) {
      this.repo.deleteRef(ref);
    }
    logStructured("skip_cleared", { patchset: [...patchset], name });
  }

  /** Names of the ranges under `patchset` that contain `commit`, sorted. */
  rangesOf(patchset: PatchsetId, commit: Commit): string[] {
    const out: string[] = [];
    for (const name of [...this.rangesFor(patchset)].sort()) {
      if (this.contains(commit, this.markersOf(patchset, name))) out.push(name);
    }
    return out;
  }

  /**
   * Bulk `contains` over a region listed children-first (as returned by revList).
   * Descent from a marker is propagated through the region; only parents that fall outside
   * the region are asked of the repository.
   */
  enclosed(patchset: PatchsetId, region: CommitNode[]): Map<Commit, string[]> {
    const out = new Map<Commit, string[]>();
    const inRegion = new Set(region.map((n) => n.commit));
    const boundary = new Set<Commit>();
    for (const n of region) {
      for (const p of n.parents) if (!inRegion.has(p)) boundary.add(p);
    }
    for (const name of [...this.rangesFor(patchset)].sort()) {
      const markers = [...this.markersOf(patchset, name)];
      if (markers.length === 0) continue;
      const markerSet = new Set(markers);

      const ancestorsOfMarkers = new Set<Commit>();
      for (const n of this.repo.revList(markers, [...boundary])) {
        if (inRegion.has(n.commit)) ancestorsOfMarkers.add(n.commit);
      }

      const outside = markers.filter((m) => !inRegion.has(m));
      const descends = new Map<Commit, boolean>();
      for (let i = region.length - 1; i >= 0; i--) {
        const node = region[i];
        if (node === undefined) continue;
        let hit = markerSet.has(node.commit);
        for (const p of node.parents) {
          if (hit) break;
          hit = inRegion.has(p)
            ? descends.get(p) === true
            : outside.some((m) => this.repo.ancestry(m, p));
        }
        descends.set(node.commit, hit);
      }

      for (const node of region) {
        if (descends.get(node.commit) === true && ancestorsOfMarkers.has(node.commit)) {
          const list = out.get(node.commit) ?? [];
          list.push(name);
          out.set(node.commit, list);
        }
      }
    }
    return out;
  }
}
