/**
 * Persists decisions: the reference write comes first, then the audit line.
 * Callers hold a non-cancellable section around `record`.
 */

import type { AuditEntry, AuditLog } from "../audit/log.js";
import { logStructured } from "../log.js";
import type { RefNames } from "../refs/names.js";
import type { Commit, Repository } from "../repo/types.js";
import type { SkipRangeTracker } from "../skip/tracker.js";
import { plainSkipName } from "../skip/tracker.js";
import type { OracleOutcome } from "../oracle/outcome.js";

export class DecisionRecorder {
  constructor(
    private readonly repo: Repository,
    private readonly names: RefNames,
    private readonly tracker: SkipRangeTracker,
    private readonly audit: AuditLog,
  ) {}

  /** `expectedBad` makes the bad write a compare-and-swap against the value read earlier. */
  record(entry: AuditEntry, expectedBad?: Commit | null): void {
    const description = this.repo.describe(entry.commit);
    this.apply(entry, expectedBad);
    this.audit.record(entry, description);
    logStructured("decision_recorded", { ...entry });
  }

  /** Reference write only. */
  apply(entry: AuditEntry, expectedBad?: Commit | null): void {
    switch (entry.kind) {
      case "good":
        this.repo.setRef(this.names.good(entry.commit), entry.commit);
        break;
      case "bad":
        this.repo.setRef(this.names.bad(), entry.commit, expectedBad);
        break;
      case "skip":
        this.tracker.mark(entry.patchset, entry.name, entry.commit);
        break;
    }
  }

  static entryFor(commit: Commit, outcome: OracleOutcome, patchset: Commit[]): AuditEntry {
    switch (outcome.kind) {
      case "good":
        return { kind: "good", commit };
      case "bad":
        return { kind: "bad", commit };
      case "skip":
        return { kind: "skip", commit, name: plainSkipName(commit), patchset: [...patchset] };
      case "skip-range":
        return { kind: "skip", commit, name: outcome.name, patchset: [...patchset] };
    }
  }
}
