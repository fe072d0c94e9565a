import { MalformedVersionError } from "./types/errors.js";

const NUMERIC_IDENTIFIER = "0|[1-9][0-9]*";
const PRERELEASE_IDENTIFIER = `(?:${NUMERIC_IDENTIFIER}|[0-9]*[A-Za-z-][0-9A-Za-z-]*)`;
const BUILD_IDENTIFIER = "[0-9A-Za-z-]+";

/**
 * MAJOR.MINOR.PATCH, then an optional pre-release and optional build metadata.
 *
 * The dash in front of the pre-release may be left out (`1.0.1b`, and `1.0.01` is patch `0` with
 * pre-release `1`). A dash right after the patch is always the separator, so `1.0.0-` is not
 * read as pre-release `-`.
 */
const versionRegex = new RegExp(
  `^(?<major>${NUMERIC_IDENTIFIER})\\.(?<minor>${NUMERIC_IDENTIFIER})\\.(?<patch>${NUMERIC_IDENTIFIER})` +
    `(?:(?:-|(?!-))(?<prerelease>${PRERELEASE_IDENTIFIER}(?:\\.${PRERELEASE_IDENTIFIER})*))?` +
    `(?:\\+(?<build>${BUILD_IDENTIFIER}(?:\\.${BUILD_IDENTIFIER})*))?$`,
);

export interface VersionFields {
  /** Digits of the major version, exactly as written */
  major: string;
  minor: string;
  patch: string;
  /** Pre-release identifiers without the leading separator, e.g. `alpha.1` */
  prerelease?: string;
  /** Build metadata without the leading `+` */
  build?: string;
}

function getGroup(match: RegExpExecArray, name: keyof VersionFields): string | undefined {
  return match.groups?.[name];
}

/**
 * Splits a version string into its fields. Throws {@link MalformedVersionError} if the whole
 * string does not match the version grammar.
 */
export function parseVersion(raw: string): VersionFields {
  const match = versionRegex.exec(raw);
  if (match === null) {
    throw new MalformedVersionError(raw);
  }
  const major = getGroup(match, "major");
  const minor = getGroup(match, "minor");
  const patch = getGroup(match, "patch");
  if (major === undefined || minor === undefined || patch === undefined) {
    throw new MalformedVersionError(raw);
  }
  const fields: VersionFields = { major, minor, patch };
  const prerelease = getGroup(match, "prerelease");
  if (prerelease !== undefined) {
    fields.prerelease = prerelease;
  }
  const build = getGroup(match, "build");
  if (build !== undefined) {
    fields.build = build;
  }
  return fields;
}
