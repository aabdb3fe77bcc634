/**
 * Anthropic oracle constants
 */

export const ANTHROPIC_DEFAULT_MODEL = "claude-sonnet-4-20250514";

export const ANTHROPIC_MAX_TOKENS = 2_048;

export const ANTHROPIC_TIMEOUT_MS = 60_000;

export const ANTHROPIC_MAX_RETRIES = 3;

/**
 * Characters of policy text handed to the extraction oracle
 */
export const EXTRACTION_MAX_CHARS = 60_000;

export const ORACLE_SYSTEM_PROMPT = "You are a cybersecurity policy analyzer.";
