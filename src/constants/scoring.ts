/**
 * Confidence scoring and selection constants
 */

/**
 * Default eligibility threshold: a candidate must score strictly above it
 */
export const DEFAULT_CONFIDENCE_THRESHOLD = 0.6;

/**
 * Characters of page text handed to the relevance oracle
 */
export const ORACLE_EXCERPT_CHARS = 5_000;

/**
 * HackerOne marks programs it lists without the owner's participation
 * with this meta tag
 */
export const HACKERONE_EXTERNAL_PROGRAM_SELECTOR =
  'meta[name="description"].spec-external-unclaimed';

/**
 * Default number of candidates fetched and scored in parallel
 */
export const DEFAULT_SCORING_CONCURRENCY = 1;
