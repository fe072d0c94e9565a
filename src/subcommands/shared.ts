import { type Logger } from "../logLevel.js";
import { UserInputError } from "../types/errors.js";
import { readVersionListFile } from "../versionListFile.js";

/**
 * Gathers the versions given as positional arguments and, if `--file` is set, the ones listed in
 * that file. Positional versions come first.
 */
export async function collectVersions(
  positional: Array<string>,
  filePath: string | undefined,
  logger: Logger,
): Promise<string[]> {
  const versions = [...positional];
  if (filePath !== undefined) {
    versions.push(...(await readVersionListFile(filePath, logger)));
  }
  if (versions.length === 0) {
    throw new UserInputError("No versions given. Pass them as arguments or with --file.");
  }
  logger.debug(`Collected ${versions.length} version(s)`);
  return versions;
}
