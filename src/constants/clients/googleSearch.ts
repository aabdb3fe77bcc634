/**
 * Google Custom Search JSON API constants
 */

export const GOOGLE_CUSTOM_SEARCH_URL = "https://www.googleapis.com/customsearch/v1";

export const GOOGLE_SEARCH_TIMEOUT_MS = 10_000;

/**
 * The API returns at most 10 results per request
 */
export const GOOGLE_MAX_NUM = 10;
