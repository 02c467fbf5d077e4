/** Shared constants for paths and defaults used across the engine. */

/** Project-local state directory. */
export const STATE_DIR = '.specloom';

/** Config file, relative to the project root. */
export const CONFIG_FILE = `${STATE_DIR}/config.yml`;

/** Default lineage database, relative to the project root. */
export const DEFAULT_LINEAGE_PATH = `${STATE_DIR}/lineage.db`;

/** Default diagram file, relative to the project root. */
export const DEFAULT_GRAPH_PATH = 'deps.mermaid';

/** Default backlog file, relative to the project root. */
export const DEFAULT_BACKLOG_PATH = `${STATE_DIR}/backlog.md`;

/** Default log directory, relative to the project root. */
export const DEFAULT_LOG_DIR = `${STATE_DIR}/logs`;

/** SQLite busy timeout so concurrent processes wait instead of failing. */
export const BUSY_TIMEOUT_MS = 5_000;

/** Environment variable overriding the lineage database path. */
export const DB_PATH_ENV = 'SPECLOOM_DB';
