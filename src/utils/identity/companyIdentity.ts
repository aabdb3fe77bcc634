/**
 * Company identity utilities: name tokenization and site normalization
 *
 * Deterministic helpers used to decide whether a URL belongs to a company:
 * the name is reduced to strong tokens and acronyms, the base URL to a bare
 * domain or a site root.
 */

import type { CompanyTokens } from "@/types";
import { removeDiacritics } from "@/utils/text/removeDiacritics";

const TOKEN_SEPARATOR_PATTERN = /[\s\-_,.]+/;
const MIN_STRONG_TOKEN_LENGTH = 5;
const MIN_ACRONYM_LENGTH = 2;
const MAX_ACRONYM_LENGTH = 5;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Remove legal-entity suffixes (AG, GmbH, S.A., ...) wherever they appear as
 * whole words. Longer suffixes go first so "Pte Ltd" wins over "Ltd".
 */
export function stripLegalSuffixes(
  name: string,
  legalSuffixes: readonly string[],
): string {
  const ordered = [...legalSuffixes].sort((a, b) => b.length - a.length);
  let stripped = name;
  for (const suffix of ordered) {
    const pattern = new RegExp(`(?<![\\w])${escapeRegExp(suffix)}(?![\\w])`, "gi");
    stripped = stripped.replace(pattern, " ");
  }
  return stripped.replace(/\s+/g, " ").trim();
}

/**
 * All-uppercase token containing at least one letter
 */
function isUppercaseToken(token: string): boolean {
  return token === token.toUpperCase() && token !== token.toLowerCase();
}

/**
 * Split a company name into strong tokens and acronyms
 *
 * Rules:
 * - legal suffixes are stripped (case-insensitive, whole words)
 * - tokens are split on whitespace, hyphen, underscore, comma and period
 * - an all-uppercase token of 2-5 characters is an acronym
 * - otherwise a token of 5+ characters is a strong token
 * - everything else is discarded
 *
 * Both sets are lower-cased with diacritics removed so they compare
 * directly against hostnames and paths.
 *
 * @example
 * tokenizeCompanyName("ZF Friedrichshafen AG", ["AG"])
 * // { strongTokens: {"friedrichshafen"}, acronyms: {"zf"} }
 */
export function tokenizeCompanyName(
  name: string,
  legalSuffixes: readonly string[],
): CompanyTokens {
  const strongTokens = new Set<string>();
  const acronyms = new Set<string>();

  const stripped = stripLegalSuffixes(name, legalSuffixes);
  if (!stripped) {
    return { strongTokens, acronyms };
  }

  for (const token of stripped.split(TOKEN_SEPARATOR_PATTERN)) {
    if (!token) continue;
    const normalized = removeDiacritics(token.toLowerCase());

    if (
      isUppercaseToken(token) &&
      token.length >= MIN_ACRONYM_LENGTH &&
      token.length <= MAX_ACRONYM_LENGTH
    ) {
      acronyms.add(normalized);
    } else if (token.length >= MIN_STRONG_TOKEN_LENGTH) {
      strongTokens.add(normalized);
    }
  }

  return { strongTokens, acronyms };
}

/**
 * First whitespace-separated token of the raw company name
 */
export function firstNameToken(name: string): string {
  return name.trim().split(/\s+/)[0] ?? "";
}

/**
 * Extract and normalize domain from a URL string
 *
 * Returns lowercase hostname with leading "www." stripped.
 * Returns null if:
 * - URL is malformed/unparseable
 * - Hostname is missing or invalid
 *
 * @param url - Full URL string
 * @returns Normalized domain string or null if not usable
 */
export function extractWebsiteDomain(url: string): string | null {
  if (!url) return null;

  try {
    // Parse URL (throws on malformed URLs)
    const parsed = new URL(url.trim());
    let hostname = parsed.hostname.toLowerCase();

    // Strip leading "www."
    if (hostname.startsWith("www.")) {
      hostname = hostname.slice(4);
    }

    // Basic validation: must have at least one dot and non-empty
    if (!hostname || !hostname.includes(".")) {
      return null;
    }

    return hostname;
  } catch {
    // URL parsing failed - return null (log+skip behavior, no throw)
    return null;
  }
}

/**
 * Reduce a company base URL to its bare domain
 *
 * Accepts values with or without scheme ("enbw.com", "https://www.enbw.com/de/").
 *
 * @returns Lowercase host without "www.", or null if unusable
 */
export function normalizeBaseDomain(baseUrl: string): string | null {
  const trimmed = baseUrl.trim();
  if (!trimmed) return null;
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)
    ? trimmed
    : `https://${trimmed}`;
  return extractWebsiteDomain(withScheme);
}

/**
 * Normalize a company base URL to its HTTPS site root ("https://host/")
 *
 * The host keeps its "www." prefix when present, since some sites only
 * answer on it.
 *
 * @returns Site root URL, or null if the base URL is unusable
 */
export function normalizeSiteRoot(baseUrl: string): string | null {
  const trimmed = baseUrl.trim();
  if (!trimmed) return null;
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)
    ? trimmed
    : `https://${trimmed}`;

  try {
    const parsed = new URL(withScheme);
    if (!parsed.hostname.includes(".")) {
      return null;
    }
    return `https://${parsed.hostname.toLowerCase()}/`;
  } catch {
    return null;
  }
}
