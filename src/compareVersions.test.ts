import { compareVersions, sortVersions } from "./compareVersions.js";
import { MalformedVersionError } from "./types/errors.js";

describe("Version Comparison Functions", () => {
  describe("compareVersions", () => {
    it("should return 1 when first version is newer", () => {
      expect(compareVersions("1.2.3", "1.2.2")).toBe(1);
      expect(compareVersions("2.0.0", "1.9.9")).toBe(1);
      expect(compareVersions("0.0.11", "0.0.2")).toBe(1);
      expect(compareVersions("1.0.0", "1.0.0-rc.1")).toBe(1);
    });

    it("should return -1 when second version is newer", () => {
      expect(compareVersions("1.2.2", "1.2.3")).toBe(-1);
      expect(compareVersions("1.9.9", "2.0.0")).toBe(-1);
      expect(compareVersions("0.0.2", "0.0.11")).toBe(-1);
      expect(compareVersions("1.0.0-alpha", "1.0.0-alpha.1")).toBe(-1);
    });

    it("should return 0 when versions are equal", () => {
      expect(compareVersions("1.2.3", "1.2.3")).toBe(0);
      expect(compareVersions("1.2.3+a", "1.2.3+b")).toBe(0);
    });

    it("should reject versions with leading zeros", () => {
      expect(() => compareVersions("1.01.3", "1.1.3")).toThrow(MalformedVersionError);
      expect(() => compareVersions("1.1.3", "01.1.3")).toThrow(MalformedVersionError);
    });

    it("should throw error for invalid version format", () => {
      expect(() => compareVersions("invalid", "1.2.3")).toThrow(MalformedVersionError);
      expect(() => compareVersions("1.2.3", "invalid")).toThrow(MalformedVersionError);
    });

    it("should throw error for incomplete version format", () => {
      expect(() => compareVersions("2.0", "1.2.3")).toThrow(MalformedVersionError);
      expect(() => compareVersions("1.2.3", "2.0")).toThrow(MalformedVersionError);
      expect(() => compareVersions("1", "1.2.3")).toThrow(MalformedVersionError);
    });
  });

  describe("sortVersions", () => {
    const chain = [
      "1.0.0-alpha",
      "1.0.0-alpha.1",
      "1.0.0-alpha.beta",
      "1.0.0-beta",
      "1.0.0-beta.2",
      "1.0.0-beta.11",
      "1.0.0-rc.1",
      "1.0.0",
    ];

    it("should sort by precedence in ascending order", () => {
      expect(sortVersions([...chain].reverse())).toEqual(chain);
    });

    it("should sort in descending order", () => {
      expect(sortVersions(chain, "descending")).toEqual([...chain].reverse());
    });

    it("should keep the input order of equal versions", () => {
      expect(sortVersions(["1.0.0+b", "1.0.0+a", "0.9.0"])).toEqual(["0.9.0", "1.0.0+b", "1.0.0+a"]);
      expect(sortVersions(["1.0.0+b", "1.0.0+a", "0.9.0"], "descending")).toEqual([
        "1.0.0+b",
        "1.0.0+a",
        "0.9.0",
      ]);
    });

    it("should not modify the input array", () => {
      const input = ["2.0.0", "1.0.0"];
      sortVersions(input);
      expect(input).toEqual(["2.0.0", "1.0.0"]);
    });

    it("should throw on the first invalid version", () => {
      expect(() => sortVersions(["1.0.0", "1.0"])).toThrow(MalformedVersionError);
    });
  });
});
