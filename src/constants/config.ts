/**
 * Runtime configuration constants
 */

/**
 * Supported search backends
 */
export const SEARCH_BACKENDS = ["brave", "google"] as const;

export const DEFAULT_SEARCH_BACKENDS = ["brave"] as const;

/**
 * Search query classes, all enabled by default
 */
export const SEARCH_QUERY_KINDS = ["site", "company", "external"] as const;

/**
 * Default path of the SQLite database (relative to cwd)
 */
export const DEFAULT_DB_PATH = "data/app.db";
