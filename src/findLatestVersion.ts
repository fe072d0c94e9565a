import { Version } from "./Version.js";

export function findLatestVersion<TItem extends { version: string }>(
  items: Array<TItem>,
): TItem | null {
  let candidateItem: TItem | null = null;
  let candidateVersion: Version | null = null;
  for (const item of items) {
    const version = new Version(item.version);
    if (candidateVersion === null || version.gt(candidateVersion)) {
      candidateItem = item;
      candidateVersion = version;
    }
  }
  return candidateItem;
}
