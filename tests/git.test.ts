import { spawnSync } from "child_process";
import { existsSync, readFileSync, writeFileSync } from "fs";
import { join } from "path";
import { defaultConfig } from "../src/config/pbisectYaml.js";
import { RefConflictError } from "../src/errors.js";
import {
  checkpointMessage,
  GitRepository,
  parseCheckpointBranch,
  parseRefList,
  parseRevList,
} from "../src/repo/git.js";
import { BisectSession } from "../src/session/session.js";
import { removeDir, tempDir } from "./support.js";

describe("git output parsing", () => {
  it("parses rev-list --parents", () => {
    expect(parseRevList("cccc bbbb\nbbbb aaaa eeee\naaaa\n\n")).toEqual([
      { commit: "cccc", parents: ["bbbb"] },
      { commit: "bbbb", parents: ["aaaa", "eeee"] },
      { commit: "aaaa", parents: [] },
    ]);
  });

  it("keeps whole-segment ref matches only", () => {
    const out = "aaaa refs/bisect/bad\nbbbb refs/bisect/good-bbbb\ncccc refs/bisectx/bad\n";
    expect(parseRefList(out, "refs/bisect/")).toEqual(
      new Map([
        ["refs/bisect/bad", "aaaa"],
        ["refs/bisect/good-bbbb", "bbbb"],
      ]),
    );
  });

  it("records the branch in checkpoint messages", () => {
    expect(checkpointMessage("refs/heads/main")).toBe("pbisect checkpoint\n\nhead: refs/heads/main\n");
    expect(parseCheckpointBranch(checkpointMessage("refs/heads/main"))).toBe("refs/heads/main");
    expect(parseCheckpointBranch(checkpointMessage(null))).toBeNull();
  });
});

const hasGit = spawnSync("git", ["--version"]).status === 0;

describe.skipIf(!hasGit)("GitRepository", () => {
  const TIMEOUT = 30_000;
  let root: string;

  const git = (...args: string[]): string => {
    const out = spawnSync("git", args, {
      cwd: root,
      encoding: "utf8",
      env: {
        ...process.env,
        GIT_AUTHOR_NAME: "Test",
        GIT_AUTHOR_EMAIL: "test@example.com",
        GIT_COMMITTER_NAME: "Test",
        GIT_COMMITTER_EMAIL: "test@example.com",
      },
    });
    if (out.status !== 0) throw new Error(`git ${args.join(" ")}: ${out.stderr}`);
    return out.stdout.trim();
  };

  const commit = (files: Record<string, string>, message: string): string => {
    for (const [path, content] of Object.entries(files)) writeFileSync(join(root, path), content);
    git("add", "-A");
    git("commit", "-q", "-m", message);
    return git("rev-parse", "HEAD");
  };

  const read = (path: string): string => readFileSync(join(root, path), "utf8");

  beforeEach(() => {
    root = tempDir("pbisect-git-");
    git("init", "-q");
    git("symbolic-ref", "HEAD", "refs/heads/main");
    git("config", "commit.gpgsign", "false");
  });

  afterEach(() => {
    removeDir(root);
  });

  it(
    "round-trips a checkpoint with dirty and untracked files",
    () => {
      const a = commit({ "a.txt": "1\n" }, "A");
      const b = commit({ "a.txt": "2\n" }, "B");
      writeFileSync(join(root, "a.txt"), "dirty\n");
      writeFileSync(join(root, "new.txt"), "untracked\n");
      const repo = new GitRepository(root);

      const checkpoint = repo.snapshotCheckpoint();
      repo.checkout(a);
      writeFileSync(join(root, "junk.txt"), "x\n");
      repo.restoreCheckpoint(checkpoint);

      expect(repo.head()).toBe(b);
      expect(git("symbolic-ref", "HEAD")).toBe("refs/heads/main");
      expect(read("a.txt")).toBe("dirty\n");
      expect(read("new.txt")).toBe("untracked\n");
      expect(existsSync(join(root, "junk.txt"))).toBe(false);
    },
    TIMEOUT,
  );

  it(
    "applies a merge against its second mainline when the first conflicts",
    () => {
      const r = commit({ "f.txt": "base\n", "g.txt": "base\n" }, "R");
      git("checkout", "-q", "-b", "side");
      commit({ "g.txt": "side\n" }, "S");
      git("checkout", "-q", "main");
      commit({ "f.txt": "main\n" }, "M");
      git("merge", "-q", "--no-edit", "side");
      const merge = git("rev-parse", "HEAD");
      git("checkout", "-q", "-b", "target", r);
      const target = commit({ "g.txt": "other\n" }, "T");
      const repo = new GitRepository(root);

      repo.checkout(target);
      expect(repo.applyPatch(merge)).toBe(true);
      expect(read("f.txt")).toBe("main\n");
      expect(read("g.txt")).toBe("other\n");
    },
    TIMEOUT,
  );

  it(
    "leaves the tree as it was when a patch conflicts",
    () => {
      const r = commit({ "f.txt": "base\n" }, "R");
      const patch = commit({ "f.txt": "patch\n" }, "P");
      git("checkout", "-q", "-b", "other", r);
      commit({ "f.txt": "other\n" }, "O");
      const repo = new GitRepository(root);

      expect(repo.applyPatch(patch)).toBe(false);
      expect(read("f.txt")).toBe("other\n");
      expect(git("status", "--porcelain")).toBe("");
    },
    TIMEOUT,
  );

  it(
    "reports local changes and untracked files as unclean",
    () => {
      commit({ "a.txt": "1\n" }, "A");
      const repo = new GitRepository(root);
      expect(repo.isClean()).toBe(true);
      writeFileSync(join(root, "new.txt"), "x\n");
      expect(repo.isClean()).toBe(false);
    },
    TIMEOUT,
  );

  it(
    "compare-and-swaps references",
    () => {
      const a = commit({ "a.txt": "1\n" }, "A");
      const b = commit({ "a.txt": "2\n" }, "B");
      const repo = new GitRepository(root);
      repo.setRef("refs/bisect/bad", a, null);
      expect(() => repo.setRef("refs/bisect/bad", b, null)).toThrow(RefConflictError);
      repo.setRef("refs/bisect/bad", b, a);
      expect(repo.listRefs("refs/bisect")).toEqual(new Map([["refs/bisect/bad", b]]));
      repo.deleteRef("refs/bisect/bad");
      expect(repo.tryResolve("refs/bisect/bad")).toBeNull();
    },
    TIMEOUT,
  );

  it(
    "bisects a real history",
    async () => {
      const a = commit({ "a.txt": "A\n" }, "A");
      const b = commit({ "b.txt": "B\n" }, "B");
      const c = commit({ bug: "1\n" }, "C");
      const d = commit({ "d.txt": "D\n" }, "D");
      const session = new BisectSession(new GitRepository(root), defaultConfig(), { quiet: true });

      await session.start(d, [a]);
      const conclusion = await session.run(() => (existsSync(join(root, "bug")) ? "bad" : "good"));

      expect(conclusion).toEqual({ kind: "found", firstBad: c, goodParent: b, patchset: [] });
      expect(git("rev-parse", "HEAD")).toBe(d);
      expect(git("symbolic-ref", "HEAD")).toBe("refs/heads/main");
      expect(readFileSync(join(root, ".git", "PBISECT_LOG"), "utf8")).toContain(`pbisect bad ${c}\n`);
    },
    TIMEOUT,
  );
});
