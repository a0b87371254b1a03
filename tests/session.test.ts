import { writeFileSync } from "fs";
import { join } from "path";
import { defaultConfig } from "../src/config/pbisectYaml.js";
import { InconsistentHistoryError, PatchApplicationConflictError } from "../src/errors.js";
import { MemoryRepository } from "../src/repo/memory.js";
import type { Commit } from "../src/repo/types.js";
import { BisectSession } from "../src/session/session.js";
import { removeDir, step, tempDir } from "./support.js";

describe("BisectSession", () => {
  let dir: string;
  let repo: MemoryRepository;
  let s: BisectSession;
  let a: Commit, b: Commit, c: Commit, d: Commit;

  beforeEach(() => {
    dir = tempDir();
    repo = new MemoryRepository({ gitDir: dir });
    a = step(repo, "A");
    repo.attachBranch("refs/heads/main");
    b = step(repo, "B");
    c = repo.commitOnHead("C", { bug: "1" });
    d = step(repo, "D");
    s = new BisectSession(repo, defaultConfig(), { quiet: true });
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("writes nothing when start is inconsistent", async () => {
    await expect(s.start(b, [d])).rejects.toBeInstanceOf(InconsistentHistoryError);
    expect(repo.listRefs("refs/bisect").size).toBe(0);
    expect(s.audit.read()).toBe("");
  });

  it("reports status after start", async () => {
    await s.start(d, [a]);
    expect(s.status()).toEqual({
      bad: d,
      goods: [a],
      patchset: [],
      ranges: [],
      selection: { kind: "candidate", commit: c, patchset: [], growth: [], remaining: 3, steps: 2 },
      pendingCheckpoint: null,
    });
  });

  it("reports no selection before a bad commit is known", () => {
    expect(s.status().selection).toBeNull();
    expect(s.next()).toBeNull();
  });

  it("refuses contradictory manual marks", async () => {
    await s.start(c, [a]);
    await expect(s.markGood(d)).rejects.toBeInstanceOf(InconsistentHistoryError);
    await s.markGood(b);
    await expect(s.markBad(a)).rejects.toBeInstanceOf(InconsistentHistoryError);
    expect(repo.tryResolve(s.names.good(d))).toBeNull();
    expect(repo.resolve(s.names.bad())).toBe(c);
  });

  it("marks manual decisions at HEAD by default", async () => {
    await s.start(d, [a]);
    repo.checkout(c);
    expect(await s.markBad()).toEqual({ kind: "candidate", commit: b, patchset: [], growth: [], remaining: 2, steps: 1 });
    repo.checkout(b);
    expect(await s.markGood()).toEqual({ kind: "found", firstBad: c, goodParent: b, patchset: [] });
  });

  it("skips with a generated name and grows the patchset once bad's parent is skipped", async () => {
    await s.start(d, [a]);
    await s.markSkip(c);
    expect(s.status().ranges).toEqual([{ name: `skip-${c}`, markers: [c] }]);
    await s.markSkip(b, "flaky");
    expect([...s.tracker.rangesFor([])].sort()).toEqual(["flaky", `skip-${c}`]);
    expect(s.status().patchset).toEqual([c]);
  });

  describe("checkoutCandidate", () => {
    it("checks out the next candidate after a manual mark", async () => {
      await s.start(d, [a]);
      repo.checkout(c);
      const selection = await s.markBad();
      expect(s.checkoutCandidate(selection)).toBe(b);
      expect(repo.head()).toBe(b);
      expect(repo.files()).toEqual(repo.treeOf(b));
    });

    it("leaves a working tree with local changes alone", async () => {
      const selection = await s.start(d, [a]);
      repo.writeFile("wip.txt", "w");
      expect(s.checkoutCandidate(selection)).toBeNull();
      expect(repo.head()).toBe(d);
      expect(repo.readFile("wip.txt")).toBe("w");
    });

    it("stays put once the first bad commit is found", async () => {
      await s.start(d, [a]);
      repo.checkout(c);
      await s.markBad();
      const found = await s.markGood(b);
      expect(s.checkoutCandidate(found)).toBeNull();
      expect(repo.head()).toBe(c);
    });
  });

  it("clears a range", async () => {
    await s.start(d, [a]);
    await s.markSkip(c, "flaky");
    await s.clearRange("flaky");
    expect(s.status().ranges).toEqual([]);
    expect(s.audit.read().split("\n")).toContain("# clear-range: flaky");
  });

  it("replays a log into a fresh session", async () => {
    await s.start(d, [a]);
    await s.markSkip(c, "flaky");
    await s.markGood(b);
    const saved = join(dir, "saved.log");
    writeFileSync(saved, s.audit.read());

    await s.reset();
    expect(repo.listRefs("refs/bisect").size).toBe(0);
    expect(s.audit.read()).toBe("");

    expect(await s.replay(saved)).toBe(4);
    expect(repo.resolve(s.names.bad())).toBe(d);
    expect(s.selector().goods().sort()).toEqual([a, b].sort());
    expect([...s.tracker.markersOf([], "flaky")]).toEqual([c]);
    expect(s.audit.entries()).toHaveLength(4);
  });

  it("replays its own log without duplicating it", async () => {
    await s.start(d, [a]);
    const text = s.audit.read();
    await s.replay(s.audit.path);
    expect(s.audit.read()).toBe(text);
  });

  it("recovers a checkpoint left by an interrupted trial", async () => {
    repo.checkout(c);
    repo.writeFile("wip.txt", "w");
    const checkpoint = repo.snapshotCheckpoint();
    repo.setRef(s.names.checkpoint(), checkpoint);
    repo.writeFile("wip.txt", "clobbered");
    repo.writeFile("junk.txt", "x");

    expect(s.status().pendingCheckpoint).toBe(checkpoint);
    expect(await s.recover()).toBe(1);
    expect(repo.head()).toBe(c);
    expect(repo.readFile("wip.txt")).toBe("w");
    expect(repo.readFile("junk.txt")).toBeNull();
    expect(repo.tryResolve(s.names.checkpoint())).toBeNull();
    expect(await s.recover()).toBe(0);
  });

  describe("runWithPatches", () => {
    it("runs the command on the patched tree and restores it", async () => {
      const fix = repo.commit("Q", { "fix.txt": "1" }, [a]);
      const conflicting = repo.commit("P", { bug: "patched" }, [a]);
      const seen: (string | null)[] = [];

      const status = await s.runWithPatches(
        [
          { rev: fix, mode: "pick" },
          { rev: conflicting, mode: "try-pick" },
        ],
        () => {
          seen.push(repo.readFile("fix.txt"), repo.readFile("bug"));
          return 3;
        },
      );

      expect(status).toBe(3);
      expect(seen).toEqual(["1", "1"]);
      expect(repo.readFile("fix.txt")).toBeNull();
      expect(repo.head()).toBe(d);
      expect(repo.currentBranch()).toBe("refs/heads/main");
    });

    it("aborts on a conflicting pick without running the command", async () => {
      const conflicting = repo.commit("P", { bug: "patched" }, [a]);
      let ran = false;
      await expect(
        s.runWithPatches([{ rev: conflicting, mode: "pick" }], () => {
          ran = true;
          return 0;
        }),
      ).rejects.toBeInstanceOf(PatchApplicationConflictError);
      expect(ran).toBe(false);
      expect(repo.tryResolve(s.names.checkpoint())).toBeNull();
      expect(repo.files()).toEqual(repo.treeOf(d));
    });
  });
});
