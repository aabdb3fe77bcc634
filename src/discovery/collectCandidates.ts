/**
 * Candidate aggregation
 *
 * Runs every discovery source for a company, tags and filters what they
 * return, deduplicates by canonical URL and orders the survivors
 * internal-first under a cap.
 */

import type { DiscoverySource } from "@/interfaces";
import type {
  Candidate,
  CandidateSource,
  Company,
  RelevanceContext,
  Vocabulary,
} from "@/types";
import { CANDIDATES } from "@/constants";
import { normalizeBaseDomain, tokenizeCompanyName } from "@/utils/identity/companyIdentity";
import { errorMessage, logFailure } from "@/utils/failures";
import { canonicalizeUrl } from "./urlCanonicalizer";
import { isExternalPlatformUrl, isRelevantUrl } from "./relevanceFilter";
import * as logger from "@/logger";

export interface CollectCandidatesOptions {
  sources: readonly DiscoverySource[];
  vocabulary: Vocabulary;
  maxCandidates?: number;
}

/**
 * Relevance context for a company (base domain and name tokens)
 */
export function buildRelevanceContext(
  company: Company,
  vocabulary: Vocabulary,
): RelevanceContext {
  return {
    baseDomain: normalizeBaseDomain(company.baseUrl),
    tokens: tokenizeCompanyName(company.name, vocabulary.legalSuffixes),
  };
}

/**
 * Tag a URL with its candidate source
 *
 * Search hits on a bug bounty platform become external_platform candidates.
 */
function tagSource(url: string, source: DiscoverySource): CandidateSource {
  if (source.kind === "search" && isExternalPlatformUrl(url)) {
    return "external_platform";
  }
  return source.kind;
}

/**
 * Whether a tagged URL must pass the relevance filter
 *
 * security.txt policies are authoritative and sitemap pages already went
 * through the sitemap post-filter.
 */
function needsRelevanceCheck(source: CandidateSource): boolean {
  return source === "search" || source === "external_platform";
}

/**
 * Stable internal-first ordering: platform candidates go last
 */
export function orderInternalFirst(candidates: readonly Candidate[]): Candidate[] {
  const internal = candidates.filter((c) => c.source !== "external_platform");
  const external = candidates.filter((c) => c.source === "external_platform");
  return [...internal, ...external];
}

/**
 * Collect, filter and deduplicate candidates from all sources
 *
 * Sources run sequentially in the given order; a failing source contributes
 * nothing. The first occurrence of a canonical URL wins.
 */
export async function collectCandidates(
  company: Company,
  keywords: readonly string[],
  options: CollectCandidatesOptions,
): Promise<Candidate[]> {
  const { sources, vocabulary } = options;
  const maxCandidates = options.maxCandidates ?? CANDIDATES.DEFAULT_MAX_CANDIDATES;
  const context = buildRelevanceContext(company, vocabulary);

  const seen = new Set<string>();
  const candidates: Candidate[] = [];

  for (const source of sources) {
    let urls: string[];
    try {
      urls = await source.discover({ company, keywords });
    } catch (error) {
      logFailure("source_unavailable", "Discovery source failed", {
        source: source.id,
        company: company.name,
        error: errorMessage(error),
      });
      continue;
    }

    let kept = 0;
    for (const url of urls) {
      if (!url || url.length > CANDIDATES.MAX_URL_LENGTH) continue;

      const candidateSource = tagSource(url, source);
      if (needsRelevanceCheck(candidateSource) && !isRelevantUrl(url, context, vocabulary)) {
        logger.debug("Candidate rejected by relevance filter", { url, source: source.id });
        continue;
      }

      const canonicalUrl = canonicalizeUrl(url);
      if (seen.has(canonicalUrl)) continue;
      seen.add(canonicalUrl);

      // Platform candidates are fetched and reported as the program root
      const candidateUrl = candidateSource === "external_platform" ? canonicalUrl : url;
      candidates.push({ url: candidateUrl, source: candidateSource, canonicalUrl });
      kept += 1;
    }

    logger.debug("Discovery source finished", {
      source: source.id,
      company: company.name,
      returned: urls.length,
      kept,
    });
  }

  const ordered = orderInternalFirst(candidates).slice(0, maxCandidates);

  logger.info("Candidates collected", {
    company: company.name,
    total: candidates.length,
    kept: ordered.length,
  });

  return ordered;
}
