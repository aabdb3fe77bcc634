/**
 * Candidate type definitions
 *
 * Candidates are URLs suspected of hosting a disclosure policy, before and
 * after confidence scoring.
 */

import type { CANDIDATE_SOURCES } from "@/constants";

/**
 * Where a candidate URL was discovered
 */
export type CandidateSource = (typeof CANDIDATE_SOURCES)[number];

export type Candidate = {
  /** URL to fetch and report (the program root for platform candidates) */
  url: string;
  source: CandidateSource;
  /** Deduplication key (query/fragment stripped, platform paths collapsed) */
  canonicalUrl: string;
};

export type ScoredCandidate = {
  candidate: Candidate;
  /** Relevance confidence in [0, 1] */
  confidence: number;
  /** First-seen index within the run, used to break ties */
  order: number;
};
