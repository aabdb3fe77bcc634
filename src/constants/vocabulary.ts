/**
 * Vocabulary configuration constants
 */

/**
 * Path to the vocabulary JSON file (relative to cwd)
 *
 * Single source of truth for the keyword, disallow and locale lists used
 * by discovery, filtering and scoring.
 */
export const VOCABULARY_PATH = "data/vocabulary.json";
