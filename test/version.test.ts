import { describe, expect, it } from "vitest";
import { InvalidVersionError } from "../src/core/errors.js";
import { compareVersions, formatVersion, isAtOrBelow, parseVersion, tryParseVersion } from "../src/core/version.js";

const v = parseVersion;

describe("parseVersion", () => {
  it("parses dotted integers", () => {
    expect(v("7.3.10").parts).toEqual([7, 3, 10]);
    expect(v("6.0.7.1").parts).toEqual([6, 0, 7, 1]);
  });

  it("accepts a leading v and surrounding whitespace", () => {
    const parsed = v(" v8.1.0 ");
    expect(parsed.raw).toBe("v8.1.0");
    expect(parsed.parts).toEqual([8, 1, 0]);
    expect(formatVersion(parsed)).toBe("8.1.0");
  });

  it.each(["", "7.", ".7", "7..1", "7.a", "-1.0", "7.3.10-rc1", "latest"])("rejects %j", (raw) => {
    expect(() => v(raw)).toThrow(InvalidVersionError);
  });

  it("tryParseVersion returns null instead of throwing", () => {
    expect(tryParseVersion("nightly")).toBeNull();
    expect(tryParseVersion("7.4")?.parts).toEqual([7, 4]);
  });
});

describe("compareVersions", () => {
  it("compares numerically, not as strings", () => {
    expect(compareVersions(v("7.3.10"), v("7.3.9"))).toBe(1);
    expect(compareVersions(v("7.3.9"), v("7.3.10"))).toBe(-1);
  });

  it("pads the shorter tuple with zeros", () => {
    expect(compareVersions(v("6.1"), v("6.1.0"))).toBe(0);
    expect(compareVersions(v("6.0.7.1"), v("6.0.7"))).toBe(1);
    expect(compareVersions(v("6.0.7"), v("6.0.7.1"))).toBe(-1);
  });

  it("isAtOrBelow includes the limit itself", () => {
    const limit = v("6.1.2");
    expect(isAtOrBelow(v("6.1.2"), limit)).toBe(true);
    expect(isAtOrBelow(v("6.1.1"), limit)).toBe(true);
    expect(isAtOrBelow(v("6.1.3"), limit)).toBe(false);
    expect(isAtOrBelow(v("7.0"), limit)).toBe(false);
  });
});
