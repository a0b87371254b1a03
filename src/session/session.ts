/**
 * Bisection session over one repository: manual decisions, automated runs, replay and cleanup.
 * Every operation re-reads state from references.
 */

import { isAbsolute, join } from "path";
import { AuditLog, type AuditEntry } from "../audit/log.js";
import { defaultConfig, type PbisectConfig } from "../config/pbisectYaml.js";
import { InconsistentHistoryError, PatchApplicationConflictError } from "../errors.js";
import { log, logStructured, warn } from "../log.js";
import type { Oracle } from "../oracle/outcome.js";
import { RefNames, type PatchsetId } from "../refs/names.js";
import { shortHash, type Commit, type Repository } from "../repo/types.js";
import { CommitSelector } from "../select/selector.js";
import type { Selection } from "../select/types.js";
import { plainSkipName, SkipRangeTracker } from "../skip/tracker.js";
import { TrialExecutor } from "../trial/executor.js";
import { nonCancellable } from "../trial/guard.js";
import { DecisionRecorder } from "../trial/recorder.js";

export interface SessionOptions {
  quiet?: boolean;
}

export interface RangeStatus {
  name: string;
  markers: Commit[];
}

export interface SessionStatus {
  bad: Commit | null;
  goods: Commit[];
  patchset: Commit[];
  ranges: RangeStatus[];
  /** Null until a bad commit is known. */
  selection: Selection | null;
  /** A checkpoint left by an interrupted trial. */
  pendingCheckpoint: Commit | null;
}

export type PickMode = "pick" | "try-pick";

export interface PatchPick {
  rev: string;
  mode: PickMode;
}

export class BisectSession {
  readonly names: RefNames;
  readonly tracker: SkipRangeTracker;
  readonly audit: AuditLog;
  readonly recorder: DecisionRecorder;

  constructor(
    readonly repo: Repository,
    readonly config: PbisectConfig = defaultConfig(),
    private readonly options: SessionOptions = {},
  ) {
    this.names = new RefNames(config.refPrefix);
    this.tracker = new SkipRangeTracker(repo, this.names);
    const logPath = isAbsolute(config.logFile) ? config.logFile : join(repo.gitDir(), config.logFile);
    this.audit = new AuditLog(logPath);
    this.recorder = new DecisionRecorder(repo, this.names, this.tracker, this.audit);
  }

  initialPatchset(): Commit[] {
    return this.config.patchset.map((rev) => this.repo.resolve(rev));
  }

  selector(): CommitSelector {
    return new CommitSelector(this.repo, this.tracker, this.names, {
      initialPatchset: this.initialPatchset(),
      maxPatchset: this.config.maxPatchset,
    });
  }

  hasBad(): boolean {
    return this.repo.tryResolve(this.names.bad()) !== null;
  }

  /** Records the initial bad and good commits. Nothing is written if any of them is invalid. */
  async start(badRev: string, goodRevs: string[]): Promise<Selection> {
    const bad = this.repo.resolve(badRev);
    const goods = goodRevs.map((rev) => this.repo.resolve(rev));
    for (const good of goods) {
      if (this.repo.ancestry(bad, good)) throw new InconsistentHistoryError(good, bad);
    }
    this.audit.annotate(`start: bad ${badRev}${goodRevs.length > 0 ? `, good ${goodRevs.join(" ")}` : ""}`);
    await nonCancellable(() => {
      this.recorder.record({ kind: "bad", commit: bad }, this.repo.tryResolve(this.names.bad()));
      for (const good of goods) this.recorder.record({ kind: "good", commit: good });
    });
    return this.selector().select();
  }

  async markGood(rev = "HEAD"): Promise<Selection | null> {
    const commit = this.repo.resolve(rev);
    const bad = this.repo.tryResolve(this.names.bad());
    if (bad !== null && this.repo.ancestry(bad, commit)) {
      throw new InconsistentHistoryError(commit, bad);
    }
    await nonCancellable(() => this.recorder.record({ kind: "good", commit }));
    return this.peek();
  }

  async markBad(rev = "HEAD"): Promise<Selection> {
    const commit = this.repo.resolve(rev);
    for (const good of this.selector().goods()) {
      if (this.repo.ancestry(commit, good)) throw new InconsistentHistoryError(good, commit);
    }
    const current = this.repo.tryResolve(this.names.bad());
    await nonCancellable(() => this.recorder.record({ kind: "bad", commit }, current));
    return this.selector().select();
  }

  /**
   * Marks `rev` as untestable. Without `name` the commit gets a range of its own; without
   * `patchset` the mark is scoped to the patchset the selector currently uses.
   */
  async markSkip(rev = "HEAD", name?: string, patchset?: PatchsetId): Promise<Selection | null> {
    const commit = this.repo.resolve(rev);
    const scope = patchset ? [...patchset] : this.activePatchset();
    const entry: AuditEntry = {
      kind: "skip",
      commit,
      name: name ?? plainSkipName(commit),
      patchset: scope,
    };
    await nonCancellable(() => this.recorder.record(entry));
    return this.peek();
  }

  /**
   * Checks out the candidate of `selection` for a manual trial. A working tree with local
   * changes is left alone. Returns the commit checked out, or null.
   */
  checkoutCandidate(selection: Selection | null): Commit | null {
    if (selection === null || selection.kind !== "candidate") return null;
    if (!this.repo.isClean()) {
      warn(`working tree has local changes; not checking out ${shortHash(selection.commit)}`);
      return null;
    }
    this.repo.checkout(selection.commit);
    logStructured("candidate_checked_out", { commit: selection.commit });
    return selection.commit;
  }

  next(): Commit | null {
    return this.hasBad() ? this.selector().next() : null;
  }

  status(): SessionStatus {
    const selector = this.selector();
    const bad = this.repo.tryResolve(this.names.bad());
    const selection = bad === null ? null : selector.select();
    const patchset = selection === null ? this.initialPatchset() : selector.activePatchset;
    const ranges = [...this.tracker.rangesFor(patchset)].sort().map((name) => ({
      name,
      markers: [...this.tracker.markersOf(patchset, name)],
    }));
    return {
      bad,
      goods: selector.goods(),
      patchset,
      ranges,
      selection,
      pendingCheckpoint: this.repo.tryResolve(this.names.checkpoint()),
    };
  }

  /**
   * Runs trials until the search concludes. The caller's tree and branch are snapshotted
   * first and put back afterwards.
   */
  async run(oracle: Oracle, label?: string): Promise<Exclude<Selection, { kind: "candidate" }>> {
    await this.recover();
    const origin = this.repo.snapshotCheckpoint();
    this.repo.setRef(this.names.origin(), origin, null);
    const executor = new TrialExecutor(
      this.repo,
      this.selector(),
      this.tracker,
      this.names,
      this.recorder,
      this.audit,
      oracle,
      { label, quiet: this.options.quiet },
    );
    try {
      return await executor.run();
    } finally {
      await this.restore(this.names.origin());
    }
  }

  /** Applies the replayable lines of an audit log to references without running trials. */
  async replay(path: string): Promise<number> {
    const source = new AuditLog(path);
    const entries = source.entries().map((e) => this.resolveEntry(e));
    const appendToLog = source.path !== this.audit.path;
    await nonCancellable(() => {
      for (const entry of entries) {
        if (appendToLog) {
          this.recorder.record(entry);
        } else {
          this.recorder.apply(entry);
        }
      }
    });
    logStructured("replayed", { path, entries: entries.length });
    return entries.length;
  }

  async clearRange(name: string, patchset?: PatchsetId): Promise<void> {
    const scope = patchset ? [...patchset] : this.initialPatchset();
    await nonCancellable(() => {
      this.tracker.clear(scope, name);
      this.audit.annotate(`clear-range: ${name}`);
    });
  }

  /** Restores and drops snapshots left by an interrupted trial or run. Returns how many. */
  async recover(): Promise<number> {
    let restored = 0;
    for (const ref of [this.names.checkpoint(), this.names.origin()]) {
      if (await this.restore(ref)) restored++;
    }
    return restored;
  }

  /** Restores pending snapshots, deletes every reference under the prefix and the audit log. */
  async reset(): Promise<void> {
    await this.recover();
    await nonCancellable(() => {
      for (const ref of this.repo.listRefs(this.names.prefix).keys()) this.repo.deleteRef(ref);
      this.audit.remove();
    });
    logStructured("session_reset", { prefix: this.names.prefix });
  }

  /**
   * Runs `command` with `picks` applied to the working tree, then restores it.
   * A `pick` that does not apply aborts with PatchApplicationConflictError; a `try-pick` is
   * dropped.
   */
  async runWithPatches(picks: PatchPick[], command: () => number | Promise<number>): Promise<number> {
    const commits = picks.map((p) => ({ ...p, commit: this.repo.resolve(p.rev) }));
    const checkpoint = this.repo.snapshotCheckpoint();
    this.repo.setRef(this.names.checkpoint(), checkpoint, null);
    try {
      for (const p of commits) {
        if (this.repo.applyPatch(p.commit)) continue;
        if (p.mode === "pick") throw new PatchApplicationConflictError(p.commit);
        this.say(`${p.rev} does not apply; continuing without it`);
      }
      return await command();
    } finally {
      await this.restore(this.names.checkpoint());
    }
  }

  private activePatchset(): Commit[] {
    if (!this.hasBad()) return this.initialPatchset();
    const selector = this.selector();
    selector.select();
    return selector.activePatchset;
  }

  private peek(): Selection | null {
    return this.hasBad() ? this.selector().select() : null;
  }

  private resolveEntry(entry: AuditEntry): AuditEntry {
    const commit = this.repo.resolve(entry.commit);
    if (entry.kind !== "skip") return { kind: entry.kind, commit };
    return { ...entry, commit, patchset: entry.patchset.map((c) => this.repo.resolve(c)) };
  }

  private async restore(ref: string): Promise<boolean> {
    const snapshot = this.repo.tryResolve(ref);
    if (snapshot === null) return false;
    await nonCancellable(() => {
      this.repo.restoreCheckpoint(snapshot);
      this.repo.deleteRef(ref);
    });
    logStructured("checkpoint_restored", { ref, checkpoint: snapshot });
    return true;
  }

  private say(message: string): void {
    if (!this.options.quiet) log(message);
  }
}
