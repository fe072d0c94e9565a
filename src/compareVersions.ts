import { type Ordering } from "./comparePrerelease.js";
import { Version } from "./Version.js";

export type SortOrder = "ascending" | "descending";

export function compareVersions(a: string, b: string): Ordering {
  return new Version(a).compare(new Version(b));
}

/**
 * Sorts version strings by precedence and returns a new array. Versions of equal precedence
 * (e.g. only differing in build metadata) keep their relative order.
 */
export function sortVersions(versions: Array<string>, order: SortOrder = "ascending"): string[] {
  const direction = order === "ascending" ? 1 : -1;
  return versions
    .map(raw => new Version(raw))
    .sort((a, b) => direction * a.compare(b))
    .map(version => version.raw);
}
