export type NumericField = "major" | "minor" | "patch";

/**
 * Base class of the errors thrown while turning a string into a {@link Version}.
 */
export class VersionError extends Error {
  constructor(
    message: string,
    public readonly input: string,
  ) {
    super(message);
    this.name = "VersionError";
  }
}

export class MalformedVersionError extends VersionError {
  constructor(input: string) {
    super(
      `Invalid version format: "${input}". Expected MAJOR.MINOR.PATCH[-PRERELEASE][+BUILD].`,
      input,
    );
    this.name = "MalformedVersionError";
  }
}

export class InvalidNumericFieldError extends VersionError {
  constructor(
    input: string,
    public readonly field: NumericField,
    public readonly value: string,
  ) {
    super(`Invalid ${field} component ${value} in "${input}"`, input);
    this.name = "InvalidNumericFieldError";
  }
}

/**
 * An error caused by how the command line tool was invoked. Printed without a stack trace.
 */
export class UserInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UserInputError";
  }
}
