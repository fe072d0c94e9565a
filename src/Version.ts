import { comparePrerelease, type Ordering } from "./comparePrerelease.js";
import { parseVersion } from "./parseVersion.js";
import { InvalidNumericFieldError, type NumericField } from "./types/errors.js";

function toNumericField(input: string, field: NumericField, value: string): number {
  const num = +value;
  if (!Number.isSafeInteger(num) || num < 0) {
    throw new InvalidNumericFieldError(input, field, value);
  }
  return num;
}

/**
 * A parsed semantic version.
 *
 * Ordering follows SemVer 2.0.0 precedence. Build metadata is kept but never takes part in
 * comparisons, so `1.0.0+a` and `1.0.0+b` are equal.
 */
export class Version {
  public readonly major: number;
  public readonly minor: number;
  public readonly patch: number;
  public readonly prerelease: string | undefined;
  public readonly build: string | undefined;

  /**
   * @throws MalformedVersionError if `raw` is not a valid version string
   * @throws InvalidNumericFieldError if a core component does not fit in a safe integer
   */
  public constructor(public readonly raw: string) {
    const fields = parseVersion(raw);
    this.major = toNumericField(raw, "major", fields.major);
    this.minor = toNumericField(raw, "minor", fields.minor);
    this.patch = toNumericField(raw, "patch", fields.patch);
    this.prerelease = fields.prerelease;
    this.build = fields.build;
  }

  public static compare(a: Version, b: Version): Ordering {
    return a.compare(b);
  }

  /**
   * Three-way comparison by precedence. Returns 0 only when the core versions and the
   * pre-release text are identical.
   */
  public compare(other: Version): Ordering {
    if (this.major !== other.major) return this.major < other.major ? -1 : 1;
    if (this.minor !== other.minor) return this.minor < other.minor ? -1 : 1;
    if (this.patch !== other.patch) return this.patch < other.patch ? -1 : 1;
    return comparePrerelease(this.prerelease, other.prerelease);
  }

  public eq(other: Version): boolean {
    return this.compare(other) === 0;
  }

  public ne(other: Version): boolean {
    return !this.eq(other);
  }

  public lt(other: Version): boolean {
    return this.compare(other) < 0;
  }

  public le(other: Version): boolean {
    return this.compare(other) <= 0;
  }

  public gt(other: Version): boolean {
    return this.compare(other) > 0;
  }

  public ge(other: Version): boolean {
    return this.compare(other) >= 0;
  }
}
