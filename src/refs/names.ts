/**
 * Reference layout under the bisect prefix:
 *   <prefix>/bad
 *   <prefix>/good-<hash>
 *   <prefix>/patchset/<h1>/.../<hn>/markers/<name>/<hash>
 *   <prefix>/checkpoint
 *   <prefix>/origin
 */

import { InvalidRangeNameError } from "../errors.js";
import type { Commit } from "../repo/types.js";

export const DEFAULT_REF_PREFIX = "refs/bisect";

const GOOD_PREFIX = "good-";
const PATCHSET_SEGMENT = "patchset";
const MARKERS_SEGMENT = "markers";
const HASH_RE = /^[0-9a-f]{4,64}$/;
const RANGE_NAME_RE = /^[A-Za-z0-9._-]+$/;

/** Ordered patchset hashes; doubles as the patchset identifier. */
export type PatchsetId = readonly Commit[];

export function isValidRangeName(name: string): boolean {
  return (
    RANGE_NAME_RE.test(name) &&
    !name.startsWith(".") &&
    !name.includes("..") &&
    !name.endsWith(".lock") &&
    name !== MARKERS_SEGMENT
  );
}

export function assertRangeName(name: string): void {
  if (!isValidRangeName(name)) throw new InvalidRangeNameError(name);
}

export function formatPatchset(patchset: PatchsetId): string {
  return patchset.join(",");
}

export function parsePatchset(value: string): Commit[] {
  return value.split(",").map((s) => s.trim()).filter(Boolean);
}

export class RefNames {
  readonly prefix: string;

  constructor(prefix: string = DEFAULT_REF_PREFIX) {
    this.prefix = prefix.replace(/\/+$/, "");
  }

  bad(): string {
    return `${this.prefix}/bad`;
  }

  good(commit: Commit): string {
    return `${this.prefix}/${GOOD_PREFIX}${commit}`;
  }

  checkpoint(): string {
    return `${this.prefix}/checkpoint`;
  }

  /** Snapshot of the user's tree taken before an automated run. */
  origin(): string {
    return `${this.prefix}/origin`;
  }

  /** Returns the commit hash of a good ref, or null for any other name. */
  parseGood(ref: string): Commit | null {
    const head = `${this.prefix}/${GOOD_PREFIX}`;
    if (!ref.startsWith(head)) return null;
    const hash = ref.slice(head.length);
    return HASH_RE.test(hash) ? hash : null;
  }

  markersRoot(patchset: PatchsetId): string {
    return [this.prefix, PATCHSET_SEGMENT, ...patchset, MARKERS_SEGMENT].join("/");
  }

  range(patchset: PatchsetId, name: string): string {
    assertRangeName(name);
    return `${this.markersRoot(patchset)}/${name}`;
  }

  marker(patchset: PatchsetId, name: string, commit: Commit): string {
    return `${this.range(patchset, name)}/${commit}`;
  }

  /** Splits `<markersRoot>/<name>/<hash>` for the given patchset. */
  parseMarker(patchset: PatchsetId, ref: string): { name: string; commit: Commit } | null {
    const root = this.markersRoot(patchset) + "/";
    if (!ref.startsWith(root)) return null;
    const parts = ref.slice(root.length).split("/");
    if (parts.length !== 2) return null;
    const [name, commit] = parts;
    if (name === undefined || commit === undefined) return null;
    if (!isValidRangeName(name) || !HASH_RE.test(commit)) return null;
    return { name, commit };
  }
}
