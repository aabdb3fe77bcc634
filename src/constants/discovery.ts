/**
 * Discovery constants
 *
 * Candidate sources, known bug bounty platforms and the tunables of each
 * discovery adapter
 */

/**
 * Where a candidate URL can come from
 * Source of truth for the CandidateSource type
 */
export const CANDIDATE_SOURCES = [
  "authoritative",
  "search",
  "sitemap",
  "external_platform",
] as const;

/**
 * Third-party bug bounty platforms recognized by the filter and canonicalizer
 *
 * - domain: a hostname equal to or ending in this domain belongs to the platform
 * - programHosts: hosts whose paths collapse to a program root
 * - programRootPattern: prefix of the path identifying a single program
 */
export const EXTERNAL_PLATFORMS = [
  {
    id: "intigriti",
    domain: "intigriti.com",
    programHosts: ["app.intigriti.com"],
    // /programs/<org>/<program>
    programRootPattern: /^\/programs\/[^/]+\/[^/]+/,
  },
  {
    id: "hackerone",
    domain: "hackerone.com",
    programHosts: ["hackerone.com", "www.hackerone.com"],
    // /<program>
    programRootPattern: /^\/[^/]+/,
  },
] as const;

/**
 * Search adapter tunables
 */
export const SEARCH = {
  /** Results requested per query */
  RESULTS_PER_QUERY: 5,
  /** Attempts per query while the backend answers 429 */
  RATE_LIMIT_MAX_ATTEMPTS: 3,
  /** Backoff is min(2^attempt, cap) seconds */
  RATE_LIMIT_BACKOFF_CAP_MS: 8_000,
  /** Pause after every query to avoid burst rate limiting */
  INTER_QUERY_DELAY_MS: 1_000,
  /** Company first tokens shorter than this get no abbreviated platform queries */
  MIN_FIRST_TOKEN_LENGTH: 3,
  /** Platform-scoped query templates; {name} is replaced by the company name or its first token */
  EXTERNAL_QUERY_TEMPLATES: [
    "{name} site:app.intigriti.com",
    "{name} site:intigriti.com programs",
    "{name} site:hackerone.com",
    "{name} hackerone program",
  ],
  /** Templates also run for the company's first token */
  FIRST_TOKEN_QUERY_TEMPLATES: [
    "{name} site:app.intigriti.com",
    "{name} site:hackerone.com",
    "{name} intigriti program",
    "{name} hackerone program",
  ],
};

/**
 * Sitemap walk limits
 */
export const SITEMAP = {
  /** Sitemap locations probed in addition to robots.txt declarations */
  DEFAULT_PATHS: ["/sitemap.xml", "/sitemap_index.xml"],
  /** Maximum nesting of sitemap indexes below a root sitemap */
  MAX_DEPTH: 3,
  /** Maximum sitemap documents fetched per site */
  MAX_DOCUMENTS: 50,
  /** Maximum page URLs collected per site */
  MAX_PAGES: 50_000,
};

/**
 * security.txt locations, in lookup order (RFC 9116 section 3)
 */
export const SECURITY_TXT = {
  PATHS: ["/.well-known/security.txt", "/security.txt"],
  MEDIA_TYPE: "text/plain",
};

/**
 * Candidate aggregation limits
 */
export const CANDIDATES = {
  /** Default cap on candidates fetched and scored per company */
  DEFAULT_MAX_CANDIDATES: 10,
  /** URLs longer than this are ignored (tracking/spam) */
  MAX_URL_LENGTH: 500,
};

/**
 * HTTP configuration for page, sitemap and security.txt requests
 */
export const HTTP = {
  /** Timeout in milliseconds for each HTTP request */
  TIMEOUT_MS: 10_000,
  /** Maximum number of attempts for failed requests */
  MAX_ATTEMPTS: 2,
  HEADERS: {
    Accept:
      "text/html,application/xhtml+xml,application/xml;q=0.9,application/pdf;q=0.9,text/plain;q=0.8,*/*;q=0.5",
    "User-Agent": "Mozilla/5.0 (compatible; vdp-finder/0.1)",
  },
};
