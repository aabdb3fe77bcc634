/**
 * Failure codes attached to every degraded step
 */
export const FAILURE_CODES = [
  "source_unavailable",
  "rate_limited",
  "unsupported_content",
  "size_exceeded",
  "extraction_failure",
  "oracle_failure",
] as const;
