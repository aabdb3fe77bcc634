/**
 * Confidence scoring type definitions
 */

import type { Company } from "./company";
import type { FetchedContent } from "./content";

export type ScoringInput = {
  content: FetchedContent;
  company: Company;
  url: string;
};

/**
 * One link of the scoring chain
 *
 * Returns a definite confidence, or null to defer to the next strategy.
 */
export type ScoringStrategy = {
  name: string;
  score(input: ScoringInput): number | null | Promise<number | null>;
};

export type ScoreOutcome = {
  confidence: number;
  /** Name of the strategy that produced the confidence */
  strategy: string;
};
