/**
 * Discovery type definitions
 */

import type { SEARCH_QUERY_KINDS } from "@/constants";
import type { Company, CompanyTokens } from "./company";

/**
 * Input shared by every discovery source
 */
export type DiscoveryQuery = {
  company: Company;
  /** Disclosure keywords used for site-scoped search queries */
  keywords: readonly string[];
};

/**
 * Context the relevance filter needs to judge a URL
 */
export type RelevanceContext = {
  /** Bare host of the company site (no scheme, no "www.") */
  baseDomain: string | null;
  tokens: CompanyTokens;
};

/**
 * Single "Field: value" line of a security.txt file
 */
export type SecurityTxtField = {
  /** Lower-cased field name (e.g. "policy", "contact") */
  name: string;
  value: string;
};

/**
 * Result of resolving a security.txt file
 */
export type SecurityTxtLookup = {
  /** Final URL the file was served from */
  securityTxtUrl: string;
  /** First Policy field, if any */
  policyUrl: string | null;
  fields: SecurityTxtField[];
};

export type SearchQueryKind = (typeof SEARCH_QUERY_KINDS)[number];

export type SearchQuery = {
  kind: SearchQueryKind;
  text: string;
};

/**
 * Parsed sitemap XML document
 */
export type SitemapDocument =
  | {
      kind: "index";
      /** Child sitemap URLs */
      sitemaps: string[];
    }
  | {
      kind: "urlset";
      /** Page URLs */
      pages: string[];
    }
  | {
      kind: "unknown";
    };
