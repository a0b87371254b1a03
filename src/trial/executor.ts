/**
 * Trial loop: select, check out, patch, ask the oracle, restore, record.
 */

import type { AuditLog } from "../audit/log.js";
import { log, logStructured } from "../log.js";
import type { RefNames } from "../refs/names.js";
import type { Commit, Repository } from "../repo/types.js";
import { shortHash } from "../repo/types.js";
import type { CommitSelector } from "../select/selector.js";
import type { Selection } from "../select/types.js";
import type { SkipRangeTracker } from "../skip/tracker.js";
import { consultOracle, formatOutcome, type Oracle, type OracleOutcome } from "../oracle/outcome.js";
import { nonCancellable } from "./guard.js";
import { DecisionRecorder } from "./recorder.js";

export interface PatchResult {
  applied: Commit[];
  failed: Commit[];
  /** Set when the patched tree is already known to fall in this skip range. */
  knownRange: string | null;
}

export type TrialReport =
  | {
      kind: "tested";
      commit: Commit;
      patchset: Commit[];
      patches: PatchResult;
      outcome: OracleOutcome;
      /** True when the outcome came from an existing skip range instead of the oracle. */
      shortCircuited: boolean;
    }
  | { kind: "done"; selection: Exclude<Selection, { kind: "candidate" }> };

export interface TrialExecutorOptions {
  /** Shown as `# run: ...` in the audit log before each oracle call. */
  label?: string;
  quiet?: boolean;
}

export class TrialExecutor {
  /** Growth last written to the audit log, as comma-joined commits. */
  private loggedGrowth = "";

  constructor(
    private readonly repo: Repository,
    private readonly selector: CommitSelector,
    private readonly tracker: SkipRangeTracker,
    private readonly names: RefNames,
    private readonly recorder: DecisionRecorder,
    private readonly audit: AuditLog,
    private readonly oracle: Oracle,
    private readonly options: TrialExecutorOptions = {},
  ) {}

  async step(): Promise<TrialReport> {
    const selection = this.selector.select();
    if (selection.kind !== "candidate") return { kind: "done", selection };

    const growth = selection.growth.map((g) => g.commit).join(",");
    if (growth !== this.loggedGrowth) {
      for (const g of selection.growth) {
        this.audit.annotate(`patchset: prepend ${g.commit} (ranges: ${g.ranges.join(", ")})`);
      }
      this.loggedGrowth = growth;
    }
    const expectedBad = this.selector.bad();
    const commit = selection.commit;
    this.say(
      `testing ${this.repo.describe(commit)} (${selection.remaining} left, ~${selection.steps} steps)`,
    );

    this.repo.checkout(commit);
    const checkpoint = this.repo.snapshotCheckpoint();
    this.repo.setRef(this.names.checkpoint(), checkpoint, null);

    const { patches, outcome } = await this.trial(commit, selection.patchset, checkpoint);

    const entry = DecisionRecorder.entryFor(commit, outcome, selection.patchset);
    await nonCancellable(() => this.recorder.record(entry, expectedBad));
    logStructured("trial_outcome", {
      commit,
      outcome: formatOutcome(outcome),
      shortCircuited: patches.knownRange !== null,
    });
    this.say(`${shortHash(commit)}: ${formatOutcome(outcome)}`);

    return {
      kind: "tested",
      commit,
      patchset: selection.patchset,
      patches,
      outcome,
      shortCircuited: patches.knownRange !== null,
    };
  }

  private async trial(
    commit: Commit,
    patchset: Commit[],
    checkpoint: Commit,
  ): Promise<{ patches: PatchResult; outcome: OracleOutcome }> {
    try {
      const patches = this.applyPatchset(commit, patchset);
      if (patches.knownRange !== null) {
        return { patches, outcome: { kind: "skip-range", name: patches.knownRange } };
      }
      if (this.options.label !== undefined) this.audit.annotate(`run: ${this.options.label}`);
      return { patches, outcome: await consultOracle(this.oracle) };
    } finally {
      await nonCancellable(() => {
        this.repo.restoreCheckpoint(checkpoint);
        this.repo.deleteRef(this.names.checkpoint());
        logStructured("checkpoint_restored", { checkpoint });
      });
    }
  }

  /** Steps until the selector stops offering candidates; annotates the conclusion. */
  async run(): Promise<Exclude<Selection, { kind: "candidate" }>> {
    for (;;) {
      const report = await this.step();
      if (report.kind === "tested") continue;
      const { selection } = report;
      if (selection.kind === "found") {
        const line = `first bad commit: [${selection.firstBad}] ${this.subject(selection.firstBad)}`;
        this.audit.annotate(line);
        this.say(line);
      } else {
        const line = `no testable parent of [${selection.bad}]; skip ranges: ${selection.ranges.join(", ")}`;
        this.audit.annotate(line);
        this.say(line);
      }
      return selection;
    }
  }

  /**
   * Applies `patchset` in order on top of `head`. While nothing has applied yet, a failing
   * patch leaves the tree equivalent to `head` under the unapplied suffix, so a skip range
   * recorded for that suffix settles the trial.
   */
  applyPatchset(head: Commit, patchset: Commit[]): PatchResult {
    const applied: Commit[] = [];
    const failed: Commit[] = [];
    for (let i = 0; i < patchset.length; i++) {
      const patch = patchset[i];
      if (patch === undefined) continue;
      if (this.repo.applyPatch(patch)) {
        applied.push(patch);
        logStructured("patch_applied", { patch, head });
        continue;
      }
      failed.push(patch);
      logStructured("patch_failed", { patch, head });
      if (applied.length > 0) continue;
      const known = this.tracker.rangesOf(patchset.slice(i + 1), head);
      const first = known[0];
      if (first !== undefined) return { applied, failed, knownRange: first };
    }
    return { applied, failed, knownRange: null };
  }

  private subject(commit: Commit): string {
    return this.repo.describe(commit).slice(shortHash(commit).length).trim();
  }

  private say(message: string): void {
    if (!this.options.quiet) log(message);
  }
}
