import { InvalidRangeNameError } from "../src/errors.js";
import { isValidRangeName, parsePatchset, RefNames } from "../src/refs/names.js";

describe("RefNames", () => {
  const names = new RefNames();

  it("lays out fixed refs under the default prefix", () => {
    expect(names.bad()).toBe("refs/bisect/bad");
    expect(names.good("abcd1234")).toBe("refs/bisect/good-abcd1234");
    expect(names.checkpoint()).toBe("refs/bisect/checkpoint");
    expect(names.origin()).toBe("refs/bisect/origin");
  });

  it("strips a trailing slash from a custom prefix", () => {
    expect(new RefNames("refs/custom/").bad()).toBe("refs/custom/bad");
  });

  it("namespaces markers by the ordered patchset", () => {
    expect(names.marker(["aaaa", "bbbb"], "flaky", "cccc")).toBe(
      "refs/bisect/patchset/aaaa/bbbb/markers/flaky/cccc",
    );
    expect(names.marker([], "flaky", "cccc")).toBe("refs/bisect/patchset/markers/flaky/cccc");
  });

  it("parses markers only under their own patchset", () => {
    const ref = "refs/bisect/patchset/aaaa/markers/flaky/cccc";
    expect(names.parseMarker(["aaaa"], ref)).toEqual({ name: "flaky", commit: "cccc" });
    expect(names.parseMarker([], ref)).toBeNull();
    expect(names.parseMarker(["aaaa", "bbbb"], ref)).toBeNull();
  });

  it("parses good refs", () => {
    expect(names.parseGood("refs/bisect/good-abcd")).toBe("abcd");
    expect(names.parseGood("refs/bisect/bad")).toBeNull();
    expect(names.parseGood("refs/bisect/good-xyz!")).toBeNull();
  });

  it("rejects invalid range names", () => {
    expect(() => names.range([], "a/b")).toThrow(InvalidRangeNameError);
  });
});

describe("isValidRangeName", () => {
  it.each([
    ["default", true],
    ["skip-abc", true],
    ["build_2.x", true],
    [".hidden", false],
    ["a..b", false],
    ["x.lock", false],
    ["markers", false],
    ["a/b", false],
    ["", false],
    ["has space", false],
  ])("%s -> %s", (name, valid) => {
    expect(isValidRangeName(name)).toBe(valid);
  });
});

describe("patchset helpers", () => {
  it("parses comma lists", () => {
    expect(parsePatchset("aaaa, bbbb,,cccc")).toEqual(["aaaa", "bbbb", "cccc"]);
  });
});
