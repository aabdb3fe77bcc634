/**
 * Heuristic vocabulary type definitions
 *
 * The vocabulary is loaded once from data/vocabulary.json and passed
 * explicitly to filters and scorers.
 */

/**
 * Raw JSON shape of data/vocabulary.json
 */
export type VocabularyRaw = {
  version: string;
  searchKeywords: string[];
  companyQueryTerms: string[];
  disclosureUrlKeywords: string[];
  sitemapKeywords: string[];
  disallowedKeywords: string[];
  sitemapDisallowedKeywords: string[];
  disallowedLocaleFragments: string[];
  allowedLocales: string[];
  nonPolicyDocumentPatterns: string[];
  legalSuffixes: string[];
};

/**
 * Runtime vocabulary: lower-cased (except legal suffixes) and frozen
 */
export type Vocabulary = {
  readonly version: string;
  /** Keywords for site-scoped search queries */
  readonly searchKeywords: readonly string[];
  /** Disclosure terms appended to the company name in company queries */
  readonly companyQueryTerms: readonly string[];
  /** A relevant URL must contain at least one of these */
  readonly disclosureUrlKeywords: readonly string[];
  /** Broader keyword list used to pick pages out of a sitemap */
  readonly sitemapKeywords: readonly string[];
  /** Any hit rejects a URL regardless of other signals */
  readonly disallowedKeywords: readonly string[];
  /** Extended disallow list applied to sitemap pages */
  readonly sitemapDisallowedKeywords: readonly string[];
  /** Locale path fragments (e.g. "/fr/") rejected on sitemap pages */
  readonly disallowedLocaleFragments: readonly string[];
  /** "/xx-yy/" locales accepted on sitemap pages */
  readonly allowedLocales: ReadonlySet<string>;
  /** URL fragments marking non-policy documents (reports, site maps) */
  readonly nonPolicyDocumentPatterns: readonly string[];
  /** Legal-entity suffixes stripped from company names */
  readonly legalSuffixes: readonly string[];
};
