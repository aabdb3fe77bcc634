/**
 * Search backend response shapes
 *
 * Only the fields the clients read are typed.
 */

/**
 * Brave Web Search API response (GET /res/v1/web/search)
 */
export type BraveWebSearchResponse = {
  web?: {
    results?: Array<{
      url?: string;
      title?: string;
      description?: string;
    }>;
  };
};

/**
 * Google Custom Search JSON API response (GET /customsearch/v1)
 */
export type GoogleCustomSearchResponse = {
  items?: Array<{
    link?: string;
    title?: string;
    snippet?: string;
  }>;
};
