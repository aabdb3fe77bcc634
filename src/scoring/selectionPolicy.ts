/**
 * Selection policy: fetch, score and pick the winning candidate
 */

import pLimit from "p-limit";
import type { Candidate, Company, FetchedContent, ScoredCandidate } from "@/types";
import { DEFAULT_CONFIDENCE_THRESHOLD, DEFAULT_SCORING_CONCURRENCY } from "@/constants";
import { errorMessage, logFailure } from "@/utils/failures";
import type { ConfidenceScorer } from "./confidenceScorer";
import * as logger from "@/logger";

export type FetchContentFn = (url: string) => Promise<FetchedContent | null>;

export interface ScoreCandidatesOptions {
  company: Company;
  fetchContent: FetchContentFn;
  scorer: ConfidenceScorer;
  /** Parallel fetch+score workers (default 1) */
  concurrency?: number;
}

export type ScoringRound = {
  /** Scored candidates in first-seen order (unfetchable ones are absent) */
  scored: ScoredCandidate[];
  /** Fetched content by canonical URL */
  contents: Map<string, FetchedContent>;
};

type WorkerResult = {
  scored: ScoredCandidate;
  content: FetchedContent;
} | null;

/**
 * Fetch and score every candidate through a bounded worker pool
 *
 * A candidate whose fetch or scoring throws is left out. Workers only
 * return their result; folding happens afterwards by
 * first-seen index, so the outcome does not depend on completion order.
 */
export async function scoreCandidates(
  candidates: readonly Candidate[],
  options: ScoreCandidatesOptions,
): Promise<ScoringRound> {
  const limit = pLimit(Math.max(1, options.concurrency ?? DEFAULT_SCORING_CONCURRENCY));

  const results = await Promise.all(
    candidates.map((candidate, order) =>
      limit(async (): Promise<WorkerResult> => {
        try {
          const content = await options.fetchContent(candidate.url);
          if (!content) {
            return null;
          }
          const { confidence, strategy } = await options.scorer.score({
            content,
            company: options.company,
            url: candidate.url,
          });
          logger.info("Candidate confidence", {
            company: options.company.name,
            url: candidate.url,
            confidence,
            strategy,
          });
          return { scored: { candidate, confidence, order }, content };
        } catch (error) {
          logFailure("source_unavailable", "Candidate could not be fetched or scored", {
            company: options.company.name,
            url: candidate.url,
            error: errorMessage(error),
          });
          return null;
        }
      }),
    ),
  );

  const scored: ScoredCandidate[] = [];
  const contents = new Map<string, FetchedContent>();
  for (const result of results) {
    if (!result) continue;
    scored.push(result.scored);
    contents.set(result.scored.candidate.canonicalUrl, result.content);
  }
  scored.sort((a, b) => a.order - b.order);

  return { scored, contents };
}

/**
 * Pick the candidate with the strictly highest confidence strictly above
 * the threshold; on equal confidence the first-seen candidate wins
 *
 * @returns The winner, or null when no candidate is eligible
 */
export function selectBestCandidate(
  scored: readonly ScoredCandidate[],
  threshold: number = DEFAULT_CONFIDENCE_THRESHOLD,
): ScoredCandidate | null {
  const ordered = [...scored].sort((a, b) => a.order - b.order);

  let best: ScoredCandidate | null = null;
  for (const entry of ordered) {
    if (entry.confidence <= threshold) {
      logger.debug("Candidate below threshold", {
        url: entry.candidate.url,
        confidence: entry.confidence,
        threshold,
      });
      continue;
    }
    if (best === null || entry.confidence > best.confidence) {
      best = entry;
    }
  }
  return best;
}
