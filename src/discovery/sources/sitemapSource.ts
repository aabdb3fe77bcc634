/**
 * SitemapSource: candidate discovery from the company's sitemap tree
 *
 * Sitemaps come from robots.txt declarations plus the conventional
 * locations. Nested sitemap indexes are walked breadth-first within depth,
 * document and page limits.
 */

import type { DiscoverySource } from "@/interfaces";
import type {
  CandidateSource,
  DiscoveryQuery,
  HttpFetchFn,
  HttpRawResponse,
  SitemapDocument,
  Vocabulary,
} from "@/types";
import { httpFetch as defaultHttpFetch } from "@/clients/http";
import { HTTP, SITEMAP } from "@/constants";
import { normalizeSiteRoot } from "@/utils/identity/companyIdentity";
import { errorMessage, logFailure } from "@/utils/failures";
import { isExcludedSitemapUrl } from "../relevanceFilter";
import { decodeSitemapBody, parseRobotsSitemaps, parseSitemapXml } from "../sitemapParser";
import * as logger from "@/logger";

export interface SitemapSourceConfig {
  vocabulary: Vocabulary;
  /**
   * Optional raw HTTP fetch function (for testing/mocking)
   * Defaults to production httpFetch implementation
   */
  httpFetch?: HttpFetchFn;
  /** Override walk limits (tests) */
  limits?: Partial<typeof SITEMAP>;
}

type QueuedSitemap = {
  url: string;
  depth: number;
};

export class SitemapSource implements DiscoverySource {
  readonly kind: CandidateSource = "sitemap";
  readonly id = "sitemap";

  private readonly vocabulary: Vocabulary;
  private readonly httpFetch: HttpFetchFn;
  private readonly limits: typeof SITEMAP;

  constructor(config: SitemapSourceConfig) {
    this.vocabulary = config.vocabulary;
    this.httpFetch = config.httpFetch ?? defaultHttpFetch;
    this.limits = { ...SITEMAP, ...config.limits };
  }

  private async get(url: string): Promise<HttpRawResponse | null> {
    try {
      return await this.httpFetch({
        method: "GET",
        url,
        headers: HTTP.HEADERS,
        timeoutMs: HTTP.TIMEOUT_MS,
        retry: { maxAttempts: HTTP.MAX_ATTEMPTS },
      });
    } catch (error) {
      logger.debug("Sitemap request failed", { url, error: errorMessage(error) });
      return null;
    }
  }

  /**
   * Sitemap URLs to start from: robots.txt declarations first, then the
   * conventional locations
   */
  private async rootSitemaps(siteRoot: string): Promise<string[]> {
    const roots: string[] = [];
    const robots = await this.get(new URL("/robots.txt", siteRoot).toString());
    if (robots) {
      roots.push(...parseRobotsSitemaps(robots.body.toString("utf-8")));
    }
    for (const path of this.limits.DEFAULT_PATHS) {
      roots.push(new URL(path, siteRoot).toString());
    }
    return [...new Set(roots)];
  }

  /**
   * Walk the sitemap tree and return every page URL found
   *
   * @returns Page URLs, or null when no sitemap could be read at all
   */
  async collectPages(siteRoot: string): Promise<string[] | null> {
    const queue: QueuedSitemap[] = (await this.rootSitemaps(siteRoot)).map((url) => ({
      url,
      depth: 0,
    }));
    const visited = new Set<string>();
    const pages = new Set<string>();
    let documentsRead = 0;

    while (queue.length > 0 && visited.size < this.limits.MAX_DOCUMENTS) {
      const next = queue.shift();
      if (!next || visited.has(next.url)) continue;
      visited.add(next.url);

      const response = await this.get(next.url);
      if (!response) continue;

      let document: SitemapDocument;
      try {
        document = parseSitemapXml(decodeSitemapBody(response.body));
      } catch (error) {
        logger.debug("Unreadable sitemap document", {
          url: next.url,
          error: errorMessage(error),
        });
        continue;
      }

      if (document.kind === "index") {
        documentsRead += 1;
        if (next.depth >= this.limits.MAX_DEPTH) {
          logger.debug("Sitemap index too deep, not descending", { url: next.url });
          continue;
        }
        for (const child of document.sitemaps) {
          queue.push({ url: child, depth: next.depth + 1 });
        }
      } else if (document.kind === "urlset") {
        documentsRead += 1;
        for (const page of document.pages) {
          if (pages.size >= this.limits.MAX_PAGES) break;
          pages.add(page);
        }
      }

      if (pages.size >= this.limits.MAX_PAGES) {
        logger.debug("Sitemap page cap reached", { siteRoot, pages: pages.size });
        break;
      }
    }

    return documentsRead > 0 ? [...pages] : null;
  }

  async discover(query: DiscoveryQuery): Promise<string[]> {
    const siteRoot = normalizeSiteRoot(query.company.baseUrl);
    if (!siteRoot) {
      logger.warn("Unusable base URL for sitemap discovery", {
        baseUrl: query.company.baseUrl,
      });
      return [];
    }

    const pages = await this.collectPages(siteRoot);
    if (pages === null) {
      logFailure("source_unavailable", "No sitemap found", { siteRoot });
      return [];
    }

    const keywordHits = pages.filter((page) => {
      const lower = page.toLowerCase();
      return this.vocabulary.sitemapKeywords.some((keyword) => lower.includes(keyword));
    });
    const relevant = keywordHits.filter((page) => !isExcludedSitemapUrl(page, this.vocabulary));

    logger.info("Sitemap pages filtered", {
      siteRoot,
      discovered: pages.length,
      keywordHits: keywordHits.length,
      kept: relevant.length,
    });

    return relevant;
  }
}
