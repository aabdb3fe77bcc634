/**
 * Policy resolver: resolves one company to its disclosure policy
 *
 * Sequence:
 * 1. security.txt: a Policy field is accepted as is (no discovery, no scoring)
 * 2. otherwise discovery, relevance filtering and confidence-scored selection
 * 3. structured extraction from the winning page
 *
 * Every step degrades on failure; only an unexpected throw turns the company
 * into an "error" resolution.
 */

import type { DiscoverySource } from "@/interfaces";
import type {
  Company,
  FetchedContent,
  Logger,
  PolicyRecord,
  PolicyResolution,
  ResolutionOptions,
  SecurityTxtLookup,
  Vocabulary,
} from "@/types";
import { canonicalizeUrl, collectCandidates } from "@/discovery";
import { scoreCandidates, selectBestCandidate } from "@/scoring";
import type { ConfidenceScorer, FetchContentFn } from "@/scoring";
import { errorMessage } from "@/utils/failures";
import * as logger from "@/logger";

export interface ResolverDeps {
  securityTxt: {
    lookup(baseUrl: string): Promise<SecurityTxtLookup | null>;
  };
  /** Sources run when security.txt names no policy, in order */
  sources: readonly DiscoverySource[];
  vocabulary: Vocabulary;
  fetchContent: FetchContentFn;
  scorer: ConfidenceScorer;
  extractor: {
    extract(company: Company, policyUrl: string, content: FetchedContent): Promise<PolicyRecord>;
  };
  options: ResolutionOptions;
}

/**
 * Extract a record from content, or an empty record when nothing was fetched
 */
async function buildRecord(
  company: Company,
  policyUrl: string,
  content: FetchedContent | null,
  deps: ResolverDeps,
  log: Logger,
): Promise<PolicyRecord> {
  if (!content) {
    log.warn("No content for policy page, record left empty", { policyUrl });
    return { companyName: company.name, policyUrl, fields: {} };
  }
  return deps.extractor.extract(company, policyUrl, content);
}

/**
 * Resolve the disclosure policy of one company
 *
 * Never rejects: unexpected failures are reported in the resolution.
 */
export async function resolveCompanyPolicy(
  company: Company,
  deps: ResolverDeps,
): Promise<PolicyResolution> {
  const log = logger.withContext({ company: company.name });
  log.info("Processing company", { baseUrl: company.baseUrl });

  try {
    const lookup = await deps.securityTxt.lookup(company.baseUrl);

    if (lookup && lookup.policyUrl) {
      const policyUrl = lookup.policyUrl;
      log.info("Policy taken from security.txt", {
        securityTxtUrl: lookup.securityTxtUrl,
        policyUrl,
      });

      const content = await deps.fetchContent(policyUrl);
      const record = await buildRecord(company, policyUrl, content, deps, log);

      return {
        company,
        status: "found",
        source: "authoritative",
        securityTxtUrl: lookup.securityTxtUrl,
        policyUrl,
        candidates: [canonicalizeUrl(policyUrl)],
        record,
      };
    }

    const securityTxtUrl = lookup?.securityTxtUrl;

    const candidates = await collectCandidates(company, deps.vocabulary.searchKeywords, {
      sources: deps.sources,
      vocabulary: deps.vocabulary,
      maxCandidates: deps.options.maxCandidates,
    });
    const candidateUrls = candidates.map((c) => c.canonicalUrl);

    if (candidates.length === 0) {
      log.warn("No candidates found");
      return { company, status: "not_found", securityTxtUrl, candidates: candidateUrls };
    }

    const round = await scoreCandidates(candidates, {
      company,
      fetchContent: deps.fetchContent,
      scorer: deps.scorer,
      concurrency: deps.options.scoringConcurrency,
    });

    const best = selectBestCandidate(round.scored, deps.options.confidenceThreshold);
    if (!best) {
      log.warn("No candidate above confidence threshold", {
        threshold: deps.options.confidenceThreshold,
        scored: round.scored.length,
      });
      return { company, status: "not_found", securityTxtUrl, candidates: candidateUrls };
    }

    const policyUrl = best.candidate.url;
    log.info("Best candidate selected", {
      policyUrl,
      confidence: best.confidence,
      source: best.candidate.source,
    });

    const content = round.contents.get(best.candidate.canonicalUrl) ?? null;
    const record = await buildRecord(company, policyUrl, content, deps, log);

    return {
      company,
      status: "found",
      source: best.candidate.source,
      securityTxtUrl,
      policyUrl,
      confidence: best.confidence,
      candidates: candidateUrls,
      record,
    };
  } catch (error) {
    log.error("Error processing company", {
      baseUrl: company.baseUrl,
      error: errorMessage(error),
    });
    return { company, status: "error", candidates: [], error: errorMessage(error) };
  }
}
