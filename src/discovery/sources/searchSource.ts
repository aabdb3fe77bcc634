/**
 * SearchSource: candidate discovery through a web search backend
 *
 * Builds site-scoped, company-scoped and platform-scoped queries, runs them
 * one by one through the configured SearchClient and merges the result
 * links in first-seen order.
 */

import type { DiscoverySource, SearchClient } from "@/interfaces";
import type {
  CandidateSource,
  Company,
  DiscoveryQuery,
  SearchQuery,
  SearchQueryKind,
  Vocabulary,
} from "@/types";
import { isHttpStatus, sleep as defaultSleep } from "@/clients/http";
import { SEARCH, SEARCH_QUERY_KINDS } from "@/constants";
import { firstNameToken, normalizeBaseDomain } from "@/utils/identity/companyIdentity";
import { errorMessage, logFailure } from "@/utils/failures";
import { stripQueryAndFragment } from "../urlCanonicalizer";
import * as logger from "@/logger";

export interface SearchSourceConfig {
  client: SearchClient;
  vocabulary: Vocabulary;
  /** Query classes to run (default: all) */
  queryKinds?: readonly SearchQueryKind[];
  /** Results requested per query */
  resultsPerQuery?: number;
  /** Pause after each query */
  interQueryDelayMs?: number;
  /** Injectable sleep (for tests) */
  sleep?: (ms: number) => Promise<void>;
}

function fillTemplate(template: string, name: string): string {
  return template.replace("{name}", name);
}

/**
 * Build the search queries for a company, deduplicated, in execution order
 *
 * - site: `site:<domain> <keyword>` for each keyword
 * - company: `<company> <term>` for each disclosure term
 * - external: platform-scoped queries for the company name, and for its
 *   first token when that token is long enough
 */
export function buildSearchQueries(
  company: Company,
  keywords: readonly string[],
  companyQueryTerms: readonly string[],
  kinds: readonly SearchQueryKind[] = SEARCH_QUERY_KINDS,
): SearchQuery[] {
  const queries: SearchQuery[] = [];
  const seen = new Set<string>();
  const add = (kind: SearchQueryKind, text: string): void => {
    const normalized = text.replace(/\s+/g, " ").trim();
    if (!normalized || seen.has(normalized)) return;
    seen.add(normalized);
    queries.push({ kind, text: normalized });
  };

  const name = company.name.trim();

  if (kinds.includes("site")) {
    const domain = normalizeBaseDomain(company.baseUrl);
    if (domain) {
      for (const keyword of keywords) {
        add("site", `site:${domain} ${keyword}`);
      }
    }
  }

  if (kinds.includes("company") && name) {
    for (const term of companyQueryTerms) {
      add("company", `${name} ${term}`);
    }
  }

  if (kinds.includes("external") && name) {
    for (const template of SEARCH.EXTERNAL_QUERY_TEMPLATES) {
      add("external", fillTemplate(template, name));
    }
    const firstToken = firstNameToken(name);
    if (firstToken.length >= SEARCH.MIN_FIRST_TOKEN_LENGTH) {
      for (const template of SEARCH.FIRST_TOKEN_QUERY_TEMPLATES) {
        add("external", fillTemplate(template, firstToken));
      }
    }
  }

  return queries;
}

export class SearchSource implements DiscoverySource {
  readonly kind: CandidateSource = "search";
  readonly id: string;

  private readonly client: SearchClient;
  private readonly vocabulary: Vocabulary;
  private readonly queryKinds: readonly SearchQueryKind[];
  private readonly resultsPerQuery: number;
  private readonly interQueryDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(config: SearchSourceConfig) {
    this.client = config.client;
    this.vocabulary = config.vocabulary;
    this.queryKinds = config.queryKinds ?? SEARCH_QUERY_KINDS;
    this.resultsPerQuery = config.resultsPerQuery ?? SEARCH.RESULTS_PER_QUERY;
    this.interQueryDelayMs = config.interQueryDelayMs ?? SEARCH.INTER_QUERY_DELAY_MS;
    this.sleep = config.sleep ?? defaultSleep;
    this.id = `search:${config.client.backend}`;
  }

  /**
   * Run a single query, retrying while the backend answers 429
   *
   * Backoff before attempt n+1 is min(2^n, cap) seconds. Any other failure,
   * or exhausting the attempts, abandons this query only.
   */
  private async runQuery(query: SearchQuery): Promise<string[]> {
    for (let attempt = 1; attempt <= SEARCH.RATE_LIMIT_MAX_ATTEMPTS; attempt++) {
      try {
        return await this.client.search(query.text, this.resultsPerQuery);
      } catch (error) {
        if (!isHttpStatus(error, 429)) {
          logFailure("source_unavailable", "Search query failed", {
            backend: this.client.backend,
            query: query.text,
            error: errorMessage(error),
          });
          return [];
        }

        if (attempt >= SEARCH.RATE_LIMIT_MAX_ATTEMPTS) {
          break;
        }

        const backoffMs = Math.min(2 ** attempt * 1000, SEARCH.RATE_LIMIT_BACKOFF_CAP_MS);
        logger.warn("Search backend rate limited, backing off", {
          backend: this.client.backend,
          query: query.text,
          attempt,
          backoffMs,
        });
        await this.sleep(backoffMs);
      }
    }

    logFailure("rate_limited", "Search query abandoned after repeated rate limiting", {
      backend: this.client.backend,
      query: query.text,
    });
    return [];
  }

  async discover(query: DiscoveryQuery): Promise<string[]> {
    const queries = buildSearchQueries(
      query.company,
      query.keywords,
      this.vocabulary.companyQueryTerms,
      this.queryKinds,
    );

    const results = new Set<string>();

    for (const searchQuery of queries) {
      logger.debug("Running search query", {
        backend: this.client.backend,
        kind: searchQuery.kind,
        query: searchQuery.text,
      });

      const links = await this.runQuery(searchQuery);
      for (const link of links) {
        const cleaned = stripQueryAndFragment(link);
        if (cleaned && !results.has(cleaned)) {
          results.add(cleaned);
          logger.debug("Search result found", { kind: searchQuery.kind, url: cleaned });
        }
      }

      if (this.interQueryDelayMs > 0) {
        await this.sleep(this.interQueryDelayMs);
      }
    }

    logger.info("Search discovery complete", {
      company: query.company.name,
      backend: this.client.backend,
      queries: queries.length,
      results: results.size,
    });

    return [...results];
  }
}
