import type { Repository } from "../repo/types.js";
import type { Selection } from "../select/types.js";
import type { SessionStatus } from "../session/session.js";

export function formatSelection(repo: Repository, selection: Selection): string {
  switch (selection.kind) {
    case "candidate": {
      const lines = [
        `next: ${repo.describe(selection.commit)} (${selection.remaining} left, ~${selection.steps} steps)`,
      ];
      if (selection.patchset.length > 0) lines.push(`patchset: ${selection.patchset.join(" ")}`);
      return lines.join("\n");
    }
    case "found":
      return `first bad commit: ${repo.describe(selection.firstBad)}`;
    case "exhausted": {
      const ranges = selection.ranges.length > 0 ? selection.ranges.join(", ") : "none";
      return `cannot narrow further: every parent of ${repo.describe(selection.bad)} is skipped (ranges: ${ranges})`;
    }
  }
}

export function formatStatus(repo: Repository, status: SessionStatus): string {
  if (status.bad === null) return "no bisection in progress";
  const lines = [`bad: ${repo.describe(status.bad)}`];
  for (const good of status.goods) lines.push(`good: ${repo.describe(good)}`);
  if (status.patchset.length > 0) lines.push(`patchset: ${status.patchset.join(" ")}`);
  for (const range of status.ranges) {
    lines.push(`skip range ${range.name}: ${range.markers.length} marker(s)`);
  }
  if (status.pendingCheckpoint !== null) {
    lines.push(`pending checkpoint: ${status.pendingCheckpoint} (run "pbisect recover")`);
  }
  if (status.selection !== null) lines.push(formatSelection(repo, status.selection));
  return lines.join("\n");
}
