/**
 * Base error class for reelsync
 */
export class ReelsyncError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReelsyncError';
  }
}

/**
 * Configuration error (bad YAML, failed validation, unresolved env variable)
 */
export class ConfigError extends ReelsyncError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * A required external tool is not installed or not runnable.
 *
 * Raised before any collection work starts; fatal to the whole run.
 */
export class MissingToolError extends ConfigError {
  constructor(
    message: string,
    public readonly tool: string,
  ) {
    super(message);
    this.name = 'MissingToolError';
  }
}

/**
 * Archive store read/append error
 */
export class ArchiveError extends ReelsyncError {
  constructor(
    message: string,
    public readonly archivePath: string,
  ) {
    super(message);
    this.name = 'ArchiveError';
  }
}

/**
 * Remote listing error (lister exited non-zero or printed undecodable output)
 */
export class ListingError extends ReelsyncError {
  constructor(
    message: string,
    public readonly locator: string,
  ) {
    super(message);
    this.name = 'ListingError';
  }
}

/**
 * Stream probe error
 */
export class ProbeError extends ReelsyncError {
  constructor(
    message: string,
    public readonly filePath: string,
  ) {
    super(message);
    this.name = 'ProbeError';
  }
}

/**
 * Metadata rewrite error
 */
export class TaggingError extends ReelsyncError {
  constructor(
    message: string,
    public readonly filePath: string,
  ) {
    super(message);
    this.name = 'TaggingError';
  }
}

/**
 * Render any thrown value as a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
