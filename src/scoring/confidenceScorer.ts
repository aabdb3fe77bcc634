/**
 * Confidence scorer: ordered chain of scoring strategies
 *
 * Each strategy either returns a definite confidence or null to defer to
 * the next one. The first definite answer wins, clamped to [0, 1].
 */

import { load } from "cheerio";
import type { RelevanceOracle } from "@/interfaces";
import type { ScoreOutcome, ScoringInput, ScoringStrategy, Vocabulary } from "@/types";
import {
  HACKERONE_EXTERNAL_PROGRAM_SELECTOR,
  ORACLE_EXCERPT_CHARS,
} from "@/constants";
import { errorMessage, logFailure } from "@/utils/failures";
import * as logger from "@/logger";

/**
 * Clamp a confidence to [0, 1]; anything non-finite counts as 0
 */
export function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

/**
 * URLs of reports, site maps and similar documents are never policies
 */
export function nonPolicyDocumentStrategy(vocabulary: Vocabulary): ScoringStrategy {
  return {
    name: "non_policy_document",
    score: ({ url }) => {
      const lower = url.toLowerCase();
      return vocabulary.nonPolicyDocumentPatterns.some((pattern) => lower.includes(pattern))
        ? 0
        : null;
    },
  };
}

/**
 * HackerOne program pages: programs listed without the owner's
 * participation carry a marker tag and score 0, every other program page
 * scores 1. Abstains without markup.
 */
export function hackerOneProgramStrategy(): ScoringStrategy {
  return {
    name: "hackerone_program",
    score: ({ url, content }) => {
      if (!url.toLowerCase().includes("hackerone.com") || content.raw === undefined) {
        return null;
      }
      const $ = load(content.raw);
      return $(HACKERONE_EXTERNAL_PROGRAM_SELECTOR).length > 0 ? 0 : 1;
    },
  };
}

/**
 * Semantic rating of the leading page text; an oracle failure scores 0
 */
export function oracleStrategy(oracle: RelevanceOracle): ScoringStrategy {
  return {
    name: "relevance_oracle",
    score: async ({ url, content, company }) => {
      try {
        const rating = await oracle.rateRelevance({
          companyName: company.name,
          url,
          excerpt: content.text.slice(0, ORACLE_EXCERPT_CHARS),
        });
        return clampConfidence(rating);
      } catch (error) {
        logFailure("oracle_failure", "Relevance oracle failed", {
          url,
          error: errorMessage(error),
        });
        return 0;
      }
    },
  };
}

export interface ConfidenceScorer {
  score(input: ScoringInput): Promise<ScoreOutcome>;
}

/**
 * Run strategies in order; a chain where every strategy abstains scores 0
 */
export function createStrategyChain(strategies: readonly ScoringStrategy[]): ConfidenceScorer {
  return {
    async score(input) {
      for (const strategy of strategies) {
        const result = await strategy.score(input);
        if (result !== null) {
          const confidence = clampConfidence(result);
          logger.debug("Candidate scored", {
            url: input.url,
            strategy: strategy.name,
            confidence,
          });
          return { confidence, strategy: strategy.name };
        }
      }
      return { confidence: 0, strategy: "none" };
    },
  };
}

export interface ConfidenceScorerDeps {
  oracle: RelevanceOracle;
  vocabulary: Vocabulary;
}

/**
 * Default chain: non-policy documents, HackerOne program check, oracle
 */
export function createConfidenceScorer(deps: ConfidenceScorerDeps): ConfidenceScorer {
  return createStrategyChain([
    nonPolicyDocumentStrategy(deps.vocabulary),
    hackerOneProgramStrategy(),
    oracleStrategy(deps.oracle),
  ]);
}
