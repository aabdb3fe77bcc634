/**
 * GoogleSearchClient: Google Custom Search JSON API client
 *
 * Implements the SearchClient interface with a single request per query.
 */

import type { SearchClient } from "@/interfaces";
import type { HttpRequestFn, SearchBackend } from "@/types";
import type { GoogleCustomSearchResponse } from "@/types/clients/search";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import {
  GOOGLE_CUSTOM_SEARCH_URL,
  GOOGLE_SEARCH_TIMEOUT_MS,
  GOOGLE_MAX_NUM,
} from "@/constants/clients/googleSearch";
import * as logger from "@/logger";

export interface GoogleSearchClientConfig {
  apiKey: string;
  /** Programmable Search Engine id (`cx`) */
  cseId: string;
  /**
   * Optional HTTP request function (for testing/mocking)
   * Defaults to production httpRequest implementation
   */
  httpRequest?: HttpRequestFn;
}

export class GoogleSearchClient implements SearchClient {
  readonly backend: SearchBackend = "google";

  private readonly apiKey: string;
  private readonly cseId: string;
  private readonly httpRequest: HttpRequestFn;

  constructor(config: GoogleSearchClientConfig) {
    const missing: string[] = [];
    if (!config.apiKey) missing.push("GOOGLE_API_KEY");
    if (!config.cseId) missing.push("GOOGLE_CSE_ID");
    if (missing.length > 0) {
      throw new Error(
        `Google Custom Search configuration missing: ${missing.join(", ")}. ` +
          `Please set these environment variables.`,
      );
    }

    this.apiKey = config.apiKey;
    this.cseId = config.cseId;
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;

    logger.debug("GoogleSearchClient initialized");
  }

  async search(query: string, count: number): Promise<string[]> {
    const num = Math.max(1, Math.min(count, GOOGLE_MAX_NUM));

    const response = await this.httpRequest<GoogleCustomSearchResponse | undefined>({
      method: "GET",
      url: GOOGLE_CUSTOM_SEARCH_URL,
      query: {
        key: this.apiKey,
        cx: this.cseId,
        q: query,
        num,
      },
      timeoutMs: GOOGLE_SEARCH_TIMEOUT_MS,
      retry: { maxAttempts: 1 },
    });

    const links: string[] = [];
    for (const item of response?.items ?? []) {
      if (item.link) {
        links.push(item.link);
      }
    }
    return links;
  }
}
