/**
 * Error taxonomy for the migration
 */

export class MigrationError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'MigrationError';
  }
}

/**
 * Trello rejected the API key or token
 */
export class AuthError extends MigrationError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'AuthError';
  }
}

/**
 * Unknown board, list or card id
 */
export class NotFoundError extends MigrationError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'NotFoundError';
  }
}

/**
 * Transport failure, timeout or non-success response on a metadata call
 */
export class NetworkError extends MigrationError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'NetworkError';
  }
}

export class DownloadError extends MigrationError {
  constructor(
    public readonly url: string,
    cause: unknown,
  ) {
    super(`Failed to download ${url}: ${describeError(cause)}`, cause);
    this.name = 'DownloadError';
  }
}

/**
 * Attachment expected on disk but gone by packaging time
 */
export class LocalFileMissingError extends MigrationError {
  constructor(public readonly path: string) {
    super(`Attachment not found: ${path}`);
    this.name = 'LocalFileMissingError';
  }
}

export class ConfigError extends MigrationError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'ConfigError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
