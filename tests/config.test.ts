import { writeFileSync } from "fs";
import { join } from "path";
import { ConfigError } from "../src/errors.js";
import { configPath, defaultConfig, loadPbisectConfig, parseConfig } from "../src/config/pbisectYaml.js";
import { removeDir, tempDir } from "./support.js";

describe("pbisect config", () => {
  let dir: string;

  beforeEach(() => {
    dir = tempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("returns defaults when the file is missing", () => {
    expect(loadPbisectConfig(dir, {})).toEqual({
      refPrefix: "refs/bisect",
      logFile: "PBISECT_LOG",
      patchset: [],
      maxPatchset: 16,
      rangeName: "default",
      exitCodes: { skip: 125, skipRange: 129 },
    });
  });

  it("loads every key", () => {
    writeFileSync(
      join(dir, ".pbisect.yml"),
      [
        "refPrefix: refs/hunt",
        "logFile: hunt.log",
        "patchset:",
        "  - fix-build",
        "maxPatchset: 3",
        "rangeName: cache",
        "exitCodes:",
        "  skip: 77",
        "  skipRange: 78",
      ].join("\n"),
    );
    expect(loadPbisectConfig(dir, {})).toEqual({
      refPrefix: "refs/hunt",
      logFile: "hunt.log",
      patchset: ["fix-build"],
      maxPatchset: 3,
      rangeName: "cache",
      exitCodes: { skip: 77, skipRange: 78 },
    });
  });

  it("follows PBISECT_CONFIG", () => {
    writeFileSync(join(dir, "other.yml"), "maxPatchset: 2\n");
    expect(configPath(dir, { PBISECT_CONFIG: "other.yml" })).toBe(join(dir, "other.yml"));
    expect(loadPbisectConfig(dir, { PBISECT_CONFIG: "other.yml" }).maxPatchset).toBe(2);
  });

  it("treats an empty file as defaults", () => {
    writeFileSync(join(dir, ".pbisect.yml"), "");
    expect(loadPbisectConfig(dir, {})).toEqual(defaultConfig());
  });

  it("reports invalid YAML", () => {
    writeFileSync(join(dir, ".pbisect.yml"), "patchset: [unclosed\n");
    expect(() => loadPbisectConfig(dir, {})).toThrow(ConfigError);
  });

  it.each([
    [{ unknown: 1 }, 'unknown key "unknown"'],
    [{ refPrefix: "heads/x" }, "refPrefix must be a string under refs/"],
    [{ maxPatchset: 65 }, "maxPatchset must be an integer between 0 and 64"],
    [{ maxPatchset: 1.5 }, "maxPatchset must be an integer between 0 and 64"],
    [{ patchset: "abc" }, "patchset must be an array of revisions"],
    [{ patchset: [1] }, "patchset[0] must be a string"],
    [{ rangeName: "a/b" }, "rangeName must be a valid skip range name"],
    [{ exitCodes: { skip: 0 } }, "exitCodes.skip must be an integer between 1 and 255"],
    [{ exitCodes: { skip: 129 } }, "exitCodes.skip and exitCodes.skipRange must differ"],
    [{ exitCodes: { other: 1 } }, 'unknown key "exitCodes.other"'],
    [["a"], "root must be an object"],
  ])("rejects %j", (raw, message) => {
    expect(() => parseConfig(raw)).toThrow(ConfigError);
    expect(() => parseConfig(raw)).toThrow(message);
  });
});
