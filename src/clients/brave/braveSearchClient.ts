/**
 * BraveSearchClient: Brave Web Search API client
 *
 * Implements the SearchClient interface. Rate-limit handling (429) is left
 * to the search adapter, so requests are issued with a single attempt.
 */

import type { SearchClient } from "@/interfaces";
import type { HttpRequestFn, SearchBackend } from "@/types";
import type { BraveWebSearchResponse } from "@/types/clients/search";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import {
  BRAVE_WEB_SEARCH_URL,
  BRAVE_DEFAULT_COUNTRY,
  BRAVE_DEFAULT_SEARCH_LANG,
  BRAVE_TIMEOUT_MS,
  BRAVE_MAX_COUNT,
} from "@/constants/clients/brave";
import * as logger from "@/logger";

export interface BraveSearchClientConfig {
  apiKey: string;
  /** Two-letter country code sent as `country` */
  country?: string;
  /** Result language sent as `search_lang` */
  searchLang?: string;
  /**
   * Optional HTTP request function (for testing/mocking)
   * Defaults to production httpRequest implementation
   */
  httpRequest?: HttpRequestFn;
}

export class BraveSearchClient implements SearchClient {
  readonly backend: SearchBackend = "brave";

  private readonly apiKey: string;
  private readonly country: string;
  private readonly searchLang: string;
  private readonly httpRequest: HttpRequestFn;

  constructor(config: BraveSearchClientConfig) {
    if (!config.apiKey) {
      throw new Error(
        "Brave Search configuration missing: BRAVE_API_KEY. Please set this environment variable.",
      );
    }
    this.apiKey = config.apiKey;
    this.country = config.country || BRAVE_DEFAULT_COUNTRY;
    this.searchLang = config.searchLang || BRAVE_DEFAULT_SEARCH_LANG;
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;

    logger.debug("BraveSearchClient initialized", {
      country: this.country,
      searchLang: this.searchLang,
    });
  }

  async search(query: string, count: number): Promise<string[]> {
    const capped = Math.max(1, Math.min(count, BRAVE_MAX_COUNT));

    const response = await this.httpRequest<BraveWebSearchResponse | undefined>({
      method: "GET",
      url: BRAVE_WEB_SEARCH_URL,
      headers: {
        Accept: "application/json",
        "X-Subscription-Token": this.apiKey,
      },
      query: {
        q: query,
        count: capped,
        country: this.country,
        search_lang: this.searchLang,
      },
      timeoutMs: BRAVE_TIMEOUT_MS,
      retry: { maxAttempts: 1 },
    });

    const results = response?.web?.results ?? [];
    const links: string[] = [];
    for (const item of results) {
      if (item.url) {
        links.push(item.url);
      }
    }
    return links.slice(0, capped);
  }
}
