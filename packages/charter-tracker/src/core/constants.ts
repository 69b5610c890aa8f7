/**
 * Charter Tracker Constants
 */

/** Collection holding the tracked charters inside each backup */
export const DEFAULT_BASE_PATH = 'db/mom-data/metadata.charter.public';

/** Extension of tracked charter records */
export const DEFAULT_TRACKED_EXTENSION = '.xml';

/** Per-directory manifest descriptor written by the repository's backup tool */
export const DEFAULT_MANIFEST_FILE_NAME = '__contents__.xml';

/**
 * Maximum number of bound parameters per chunked statement.
 * Stays below SQLite's historical 999-parameter limit.
 */
export const DEFAULT_BATCH_SIZE = 900;

/** Process every Nth backup during sync */
export const DEFAULT_BACKUP_FREQUENCY = 7;

/** Backup archive naming: full<YYYYMMDD>-<HHMM>.zip */
export const BACKUP_FILENAME_PREFIX = 'full';
export const BACKUP_FILENAME_EXTENSION = '.zip';
