import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import type { MemoryRepository } from "../src/repo/memory.js";
import type { Commit } from "../src/repo/types.js";

export function tempDir(prefix = "pbisect-test-"): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** Commit on HEAD that adds `<label>.txt`. */
export function step(repo: MemoryRepository, label: string): Commit {
  return repo.commitOnHead(label, { [`${label}.txt`]: label });
}
