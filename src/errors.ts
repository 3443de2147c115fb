export class InvalidVersionError extends Error {
  readonly version: string;

  constructor(version: string, message = `Invalid version format: ${version}`) {
    super(message);
    this.name = "InvalidVersionError";
    this.version = version;
  }
}

/**
 * Raised when a manifest cannot be read as expected: unparseable JSON,
 * a missing `version` field, or a version that does not parse.
 */
export class MalformedManifestError extends Error {
  readonly file: string;

  constructor(file: string, reason: string, options?: { cause?: unknown }) {
    super(`Malformed manifest ${file}: ${reason}`, options);
    this.name = "MalformedManifestError";
    this.file = file;
  }
}

export class ConfigError extends Error {
  readonly file: string;

  constructor(file: string, reason: string) {
    super(`Invalid config ${file}: ${reason}`);
    this.name = "ConfigError";
    this.file = file;
  }
}

export const isBumpError = (
  error: unknown,
): error is InvalidVersionError | MalformedManifestError | ConfigError =>
  error instanceof InvalidVersionError ||
  error instanceof MalformedManifestError ||
  error instanceof ConfigError;
