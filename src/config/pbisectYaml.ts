/**
 * .pbisect.yml loader (frozen schema).
 * Unknown keys or invalid values throw ConfigError (CLI exits 2). Missing file → defaults.
 */

import { existsSync, readFileSync } from "fs";
import { isAbsolute, join } from "path";
import { parse } from "yaml";
import { DEFAULT_LOG_FILE } from "../audit/log.js";
import { ConfigError } from "../errors.js";
import {
  DEFAULT_RANGE_NAME,
  DEFAULT_SKIP_EXIT_CODE,
  DEFAULT_SKIP_RANGE_EXIT_CODE,
} from "../oracle/command.js";
import { DEFAULT_REF_PREFIX, isValidRangeName } from "../refs/names.js";
import { DEFAULT_MAX_PATCHSET } from "../select/selector.js";

export const CONFIG_FILE = ".pbisect.yml";
export const CONFIG_ENV = "PBISECT_CONFIG";

const ALLOWED_KEYS = new Set([
  "refPrefix",
  "logFile",
  "patchset",
  "maxPatchset",
  "rangeName",
  "exitCodes",
]);
const ALLOWED_EXIT_CODE_KEYS = new Set(["skip", "skipRange"]);
const MIN_MAX_PATCHSET = 0;
const MAX_MAX_PATCHSET = 64;

export interface PbisectConfig {
  refPrefix: string;
  /** Relative paths are resolved against the git directory. */
  logFile: string;
  patchset: string[];
  maxPatchset: number;
  rangeName: string;
  exitCodes: { skip: number; skipRange: number };
}

export function defaultConfig(): PbisectConfig {
  return {
    refPrefix: DEFAULT_REF_PREFIX,
    logFile: DEFAULT_LOG_FILE,
    patchset: [],
    maxPatchset: DEFAULT_MAX_PATCHSET,
    rangeName: DEFAULT_RANGE_NAME,
    exitCodes: { skip: DEFAULT_SKIP_EXIT_CODE, skipRange: DEFAULT_SKIP_RANGE_EXIT_CODE },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function exitCode(value: unknown, key: string): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1 || value > 255) {
    throw new ConfigError(`${CONFIG_FILE}: exitCodes.${key} must be an integer between 1 and 255`);
  }
  return value;
}

/** Validates parsed YAML against the schema. */
export function parseConfig(raw: unknown): PbisectConfig {
  const config = defaultConfig();
  if (raw === null || raw === undefined) return config;
  if (!isRecord(raw)) throw new ConfigError(`${CONFIG_FILE}: root must be an object`);

  for (const key of Object.keys(raw)) {
    if (!ALLOWED_KEYS.has(key)) {
      throw new ConfigError(`${CONFIG_FILE}: unknown key "${key}" (schema is frozen)`);
    }
  }

  if (raw.refPrefix !== undefined) {
    const v = raw.refPrefix;
    if (typeof v !== "string" || !v.startsWith("refs/") || v.length <= "refs/".length) {
      throw new ConfigError(`${CONFIG_FILE}: refPrefix must be a string under refs/`);
    }
    config.refPrefix = v;
  }

  if (raw.logFile !== undefined) {
    if (typeof raw.logFile !== "string" || raw.logFile === "") {
      throw new ConfigError(`${CONFIG_FILE}: logFile must be a non-empty string`);
    }
    config.logFile = raw.logFile;
  }

  if (raw.patchset !== undefined) {
    if (!Array.isArray(raw.patchset)) {
      throw new ConfigError(`${CONFIG_FILE}: patchset must be an array of revisions`);
    }
    const patchset: string[] = [];
    raw.patchset.forEach((v: unknown, i) => {
      if (typeof v !== "string" || v === "") {
        throw new ConfigError(`${CONFIG_FILE}: patchset[${i}] must be a string`);
      }
      patchset.push(v);
    });
    config.patchset = patchset;
  }

  if (raw.maxPatchset !== undefined) {
    const n = raw.maxPatchset;
    if (typeof n !== "number" || !Number.isInteger(n) || n < MIN_MAX_PATCHSET || n > MAX_MAX_PATCHSET) {
      throw new ConfigError(
        `${CONFIG_FILE}: maxPatchset must be an integer between ${MIN_MAX_PATCHSET} and ${MAX_MAX_PATCHSET}`,
      );
    }
    config.maxPatchset = n;
  }

  if (raw.rangeName !== undefined) {
    if (typeof raw.rangeName !== "string" || !isValidRangeName(raw.rangeName)) {
      throw new ConfigError(`${CONFIG_FILE}: rangeName must be a valid skip range name`);
    }
    config.rangeName = raw.rangeName;
  }

  if (raw.exitCodes !== undefined) {
    const codes = raw.exitCodes;
    if (!isRecord(codes)) throw new ConfigError(`${CONFIG_FILE}: exitCodes must be an object`);
    for (const key of Object.keys(codes)) {
      if (!ALLOWED_EXIT_CODE_KEYS.has(key)) {
        throw new ConfigError(`${CONFIG_FILE}: unknown key "exitCodes.${key}"`);
      }
    }
    if (codes.skip !== undefined) config.exitCodes.skip = exitCode(codes.skip, "skip");
    if (codes.skipRange !== undefined) {
      config.exitCodes.skipRange = exitCode(codes.skipRange, "skipRange");
    }
    if (config.exitCodes.skip === config.exitCodes.skipRange) {
      throw new ConfigError(`${CONFIG_FILE}: exitCodes.skip and exitCodes.skipRange must differ`);
    }
  }

  return config;
}

/** `PBISECT_CONFIG` overrides `<repoRoot>/.pbisect.yml`. */
export function configPath(repoRoot: string, env: NodeJS.ProcessEnv = process.env): string {
  const override = env[CONFIG_ENV];
  if (override !== undefined && override !== "") {
    return isAbsolute(override) ? override : join(repoRoot, override);
  }
  return join(repoRoot, CONFIG_FILE);
}

export function loadPbisectConfig(repoRoot: string, env: NodeJS.ProcessEnv = process.env): PbisectConfig {
  const path = configPath(repoRoot, env);
  if (!existsSync(path)) return defaultConfig();

  let raw: unknown;
  try {
    raw = parse(readFileSync(path, "utf8"));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`${CONFIG_FILE}: invalid YAML: ${msg}`);
  }
  return parseConfig(raw);
}
