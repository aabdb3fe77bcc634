/**
 * Brave Search API constants
 */

export const BRAVE_WEB_SEARCH_URL = "https://api.search.brave.com/res/v1/web/search";

export const BRAVE_DEFAULT_COUNTRY = "AT";

export const BRAVE_DEFAULT_SEARCH_LANG = "en";

export const BRAVE_TIMEOUT_MS = 15_000;

/**
 * Brave caps `count` at 20
 */
export const BRAVE_MAX_COUNT = 20;
