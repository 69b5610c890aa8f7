/**
 * Charter Tracker Error Types
 *
 * Errors that abort a single backup or a whole command. Recoverable
 * conditions (unparseable manifest descriptors, discrepancies) are returned
 * as values and never thrown.
 */

/**
 * Thrown when a backup filename does not carry a valid snapshot timestamp.
 *
 * Raised before any store mutation; other backups are unaffected.
 */
export class BackupFilenameError extends Error {
  constructor(
    public readonly filename: string,
    public readonly reason: string
  ) {
    super(`Could not parse backup date from ${filename}: ${reason}`);
    this.name = 'BackupFilenameError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, BackupFilenameError);
    }
  }
}

/**
 * Thrown when the transactional phase of a backup failed.
 *
 * The transaction has been rolled back and the backup stays unprocessed,
 * so a later sync retries it.
 */
export class BackupProcessingError extends Error {
  constructor(
    public readonly filename: string,
    public readonly cause: unknown
  ) {
    super(
      `Processing ${filename} failed and was rolled back: ${
        cause instanceof Error ? cause.message : String(cause)
      }`
    );
    this.name = 'BackupProcessingError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, BackupProcessingError);
    }
  }
}

/**
 * Thrown by backup sources when listing or fetching fails
 */
export class BackupSourceError extends Error {
  constructor(
    message: string,
    public readonly filename: string | null = null
  ) {
    super(message);
    this.name = 'BackupSourceError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, BackupSourceError);
    }
  }
}

/**
 * Thrown for invalid configuration files or missing credentials
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }

  /**
   * Message plus one line per validation issue
   */
  getSummary(): string {
    if (this.issues.length === 0) {
      return this.message;
    }
    return [this.message, ...this.issues.map((issue) => `  - ${issue}`)].join('\n');
  }
}
