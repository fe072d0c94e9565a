import { readFile } from "fs/promises";
import { z } from "zod";
import { type Logger } from "./logLevel.js";
import { UserInputError } from "./types/errors.js";

/**
 * A version list file is either a plain JSON array of version strings or an object with a
 * `versions` array, so that a package manifest-like file can be passed as well.
 */
const versionListFileSchema = z.union([
  z.array(z.string()),
  z.object({
    versions: z.array(z.string()),
  }),
]);

export async function readVersionListFile(filePath: string, logger?: Logger): Promise<string[]> {
  logger?.debug(`Reading versions from ${filePath}`);
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (error) {
    throw new UserInputError(
      `Cannot read version list file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new UserInputError(
      `Version list file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const result = versionListFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new UserInputError(
      `Version list file ${filePath} must contain an array of strings or an object with a "versions" array of strings.`,
    );
  }
  const versions = Array.isArray(result.data) ? result.data : result.data.versions;
  logger?.debug(`Read ${versions.length} version(s) from ${filePath}`);
  return versions;
}
