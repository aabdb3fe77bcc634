/**
 * Relevance filter: decides whether a discovered URL can be a disclosure policy
 *
 * Pure string checks against the vocabulary and the company's name tokens.
 * No network access.
 */

import type { CompanyTokens, RelevanceContext, Vocabulary } from "@/types";
import { EXTERNAL_PLATFORMS } from "@/constants";

const HOST_LABEL_SEPARATOR = /[.-]/;
const PATH_WORD_SEPARATOR = /[^a-z0-9]+/;
const LOCALE_SEGMENT_PATTERN = /\/([a-z]{2,3}-[a-z]{2,3})\//g;
const YEAR_PATTERN = /(?<!\d)(?:199\d|20[01]\d|202[0-5])(?!\d)/;

function containsAny(haystack: string, needles: readonly string[]): boolean {
  return needles.some((needle) => haystack.includes(needle));
}

/**
 * Whether a hostname belongs to a known bug bounty platform
 */
export function isExternalPlatformHost(hostname: string): boolean {
  const host = hostname.toLowerCase();
  return EXTERNAL_PLATFORMS.some(
    (platform) => host === platform.domain || host.endsWith(`.${platform.domain}`),
  );
}

/**
 * Whether a URL is hosted on a known bug bounty platform
 */
export function isExternalPlatformUrl(url: string): boolean {
  try {
    return isExternalPlatformHost(new URL(url).hostname);
  } catch {
    return false;
  }
}

/**
 * Match the hostname's labels against the company tokens
 *
 * An exact label match weighs 2, a label that only starts or ends with the
 * token weighs 1. Accepted when:
 * - the total reaches 2
 * - the total is 1 and the company has exactly one strong token
 * - an acronym equals a label and the company has no strong tokens
 */
export function hostnameMatchesCompany(
  hostname: string,
  tokens: CompanyTokens,
): boolean {
  const labels = hostname
    .toLowerCase()
    .split(HOST_LABEL_SEPARATOR)
    .filter((label) => label.length > 0);

  let strongHits = 0;
  for (const token of tokens.strongTokens) {
    if (labels.some((label) => label === token)) strongHits += 1;
    if (labels.some((label) => label.startsWith(token) || label.endsWith(token))) {
      strongHits += 1;
    }
  }

  if (strongHits >= 2) return true;
  if (strongHits === 1 && tokens.strongTokens.size === 1) return true;

  if (tokens.strongTokens.size === 0) {
    for (const acronym of tokens.acronyms) {
      if (labels.includes(acronym)) return true;
    }
  }

  return false;
}

/**
 * Whether a platform URL path names the company
 *
 * Strong tokens decide when the company has any; acronyms only count
 * otherwise, since short acronyms collide with unrelated program names.
 */
export function pathNamesCompany(pathname: string, tokens: CompanyTokens): boolean {
  const words = pathname
    .toLowerCase()
    .split(PATH_WORD_SEPARATOR)
    .filter((word) => word.length > 0);

  if (tokens.strongTokens.size > 0) {
    return [...tokens.strongTokens].some((token) => words.includes(token));
  }
  return [...tokens.acronyms].some((acronym) => words.includes(acronym));
}

/**
 * Decide whether a candidate URL may host the company's disclosure policy
 *
 * 1. Any disallowed keyword rejects the URL.
 * 2. Company-owned hosts (base domain or company-named host) pass when the
 *    URL carries a disclosure keyword.
 * 3. Bug bounty platform URLs pass when the path names the company and the
 *    URL carries a disclosure keyword.
 */
export function isRelevantUrl(
  url: string,
  context: RelevanceContext,
  vocabulary: Vocabulary,
): boolean {
  const urlLower = url.toLowerCase();

  if (containsAny(urlLower, vocabulary.disallowedKeywords)) {
    return false;
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return false;
  }

  const hostname = parsed.hostname.toLowerCase();
  const hasKeyword = containsAny(urlLower, vocabulary.disclosureUrlKeywords);
  if (!hasKeyword) {
    return false;
  }

  const baseMatch = context.baseDomain !== null && hostname.includes(context.baseDomain);
  if (baseMatch || hostnameMatchesCompany(hostname, context.tokens)) {
    return true;
  }

  return isExternalPlatformHost(hostname) && pathNamesCompany(parsed.pathname, context.tokens);
}

/**
 * Stricter post-filter for sitemap pages
 *
 * Rejects a URL that contains an extended disallowed keyword, a disallowed
 * locale fragment, a "/xx-yy/" locale outside the allow-list, or a year
 * between 1990 and 2025.
 */
export function isExcludedSitemapUrl(url: string, vocabulary: Vocabulary): boolean {
  const urlLower = url.toLowerCase();

  if (containsAny(urlLower, vocabulary.sitemapDisallowedKeywords)) {
    return true;
  }

  if (containsAny(urlLower, vocabulary.disallowedLocaleFragments)) {
    return true;
  }

  const locales = [...urlLower.matchAll(LOCALE_SEGMENT_PATTERN)].map((m) => m[1]);
  if (locales.length > 0 && !locales.some((locale) => vocabulary.allowedLocales.has(locale))) {
    return true;
  }

  return YEAR_PATTERN.test(urlLower);
}
