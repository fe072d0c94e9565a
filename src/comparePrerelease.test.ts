import { compareIdentifiers, comparePrerelease } from "./comparePrerelease.js";

describe("compareIdentifiers", () => {
  it("should compare numeric identifiers by value", () => {
    expect(compareIdentifiers("2", "11")).toBe(-1);
    expect(compareIdentifiers("11", "2")).toBe(1);
    expect(compareIdentifiers("7", "7")).toBe(0);
  });

  it("should compare numeric identifiers beyond the safe integer range", () => {
    expect(compareIdentifiers("9007199254740993", "9007199254740992")).toBe(1);
    expect(compareIdentifiers("123456789012345678901234567890", "99")).toBe(1);
  });

  it("should rank numeric identifiers below alphanumeric ones", () => {
    expect(compareIdentifiers("1", "alpha")).toBe(-1);
    expect(compareIdentifiers("alpha", "1")).toBe(1);
    expect(compareIdentifiers("-", "0")).toBe(1);
  });

  it("should compare alphanumeric identifiers by character code", () => {
    expect(compareIdentifiers("alpha", "beta")).toBe(-1);
    expect(compareIdentifiers("rc", "beta")).toBe(1);
    expect(compareIdentifiers("B", "a")).toBe(-1);
    expect(compareIdentifiers("alpha", "alpha")).toBe(0);
  });
});

describe("comparePrerelease", () => {
  it("should rank a release above any pre-release", () => {
    expect(comparePrerelease(undefined, undefined)).toBe(0);
    expect(comparePrerelease("alpha", undefined)).toBe(-1);
    expect(comparePrerelease(undefined, "alpha")).toBe(1);
  });

  it("should decide at the first differing identifier", () => {
    expect(comparePrerelease("alpha.1", "alpha.beta")).toBe(-1);
    expect(comparePrerelease("beta.2", "beta.11")).toBe(-1);
    expect(comparePrerelease("rc.1", "beta.11")).toBe(1);
  });

  it("should rank a prefix below the longer list", () => {
    expect(comparePrerelease("alpha", "alpha.1")).toBe(-1);
    expect(comparePrerelease("alpha.1.0", "alpha.1")).toBe(1);
  });

  it("should treat identical text as equal", () => {
    expect(comparePrerelease("alpha.1", "alpha.1")).toBe(0);
  });
});
