/**
 * SearchClient interface: backend-agnostic web search contract
 *
 * Backends (Brave, Google Custom Search) implement this interface and are
 * picked by configuration.
 */

import type { SearchBackend } from "@/types";

export interface SearchClient {
  readonly backend: SearchBackend;

  /**
   * Run one web search query
   *
   * Rejects with HttpError on HTTP failures so callers can apply their own
   * rate-limit policy.
   *
   * @param query - Raw query string (may contain operators such as site:)
   * @param count - Maximum number of result links
   * @returns Result links in ranking order
   */
  search(query: string, count: number): Promise<string[]>;
}
