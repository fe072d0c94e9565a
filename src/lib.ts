export { compareIdentifiers, comparePrerelease, type Ordering } from "./comparePrerelease.js";
export { compareVersions, sortVersions, type SortOrder } from "./compareVersions.js";
export { findLatestVersion } from "./findLatestVersion.js";
export { parseVersion, type VersionFields } from "./parseVersion.js";
export {
  InvalidNumericFieldError,
  MalformedVersionError,
  VersionError,
  type NumericField,
} from "./types/errors.js";
export { Version } from "./Version.js";
