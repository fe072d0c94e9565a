import { MalformedVersionError } from "../types/errors.js";
import { Version } from "../Version.js";
import { compare, describeComparison } from "./compare.js";

describe("compare", () => {
  let infoSpy: jest.SpyInstance;

  beforeEach(() => {
    infoSpy = jest.spyOn(console, "info").mockImplementation(() => undefined);
  });

  afterEach(() => {
    infoSpy.mockRestore();
  });

  it("should describe each relation", () => {
    expect(describeComparison(new Version("1.0.0"), new Version("2.0.0"))).toBe("1.0.0 < 2.0.0");
    expect(describeComparison(new Version("1.0.0-beta.11"), new Version("1.0.0-beta.2"))).toBe(
      "1.0.0-beta.11 > 1.0.0-beta.2",
    );
    expect(describeComparison(new Version("1.0.0+a"), new Version("1.0.0+b"))).toBe(
      "1.0.0+a == 1.0.0+b",
    );
  });

  it("should print the relation between two versions", async () => {
    await compare.parseAsync(["1.0.0-alpha", "1.0.0"], { from: "user" });
    expect(infoSpy.mock.calls).toEqual([["1.0.0-alpha < 1.0.0"]]);
  });

  it("should fail for a malformed version", async () => {
    await expect(compare.parseAsync(["1.0", "1.0.0"], { from: "user" })).rejects.toThrow(
      MalformedVersionError,
    );
    expect(infoSpy).not.toHaveBeenCalled();
  });

  it("should print the result as JSON", async () => {
    await compare.parseAsync(["2.0.0", "1.0.0", "--json"], { from: "user" });
    expect(infoSpy.mock.calls).toEqual([['{"left":"2.0.0","right":"1.0.0","result":1}']]);
  });
});
