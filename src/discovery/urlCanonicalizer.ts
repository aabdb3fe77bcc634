/**
 * URL canonicalization: deduplication keys for candidate URLs
 */

import { EXTERNAL_PLATFORMS } from "@/constants";

const WEB_PROTOCOLS: ReadonlySet<string> = new Set(["http:", "https:"]);

/**
 * Canonical form of a URL
 *
 * - generic URLs keep scheme, host and path; query and fragment are dropped
 * - program pages on known bug bounty platforms collapse to the program root
 *   (app.intigriti.com/programs/<org>/<program>, hackerone.com/<program>)
 * - other schemes (mailto:, ...) only lose query and fragment
 * - unparseable input is returned trimmed
 *
 * Idempotent: canonicalizeUrl(canonicalizeUrl(u)) === canonicalizeUrl(u).
 */
export function canonicalizeUrl(url: string): string {
  const trimmed = url.trim();

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    return trimmed;
  }

  if (!WEB_PROTOCOLS.has(parsed.protocol)) {
    return stripQueryAndFragment(trimmed);
  }

  const host = parsed.host.toLowerCase();
  const hostname = parsed.hostname.toLowerCase();

  for (const platform of EXTERNAL_PLATFORMS) {
    if (!platform.programHosts.some((programHost) => programHost === hostname)) {
      continue;
    }
    const match = platform.programRootPattern.exec(parsed.pathname);
    if (match) {
      return `${parsed.protocol}//${host}${match[0]}`;
    }
  }

  return `${parsed.protocol}//${host}${parsed.pathname}`;
}

/**
 * Strip query string and fragment without any other normalization
 *
 * Used when merging raw search results, before canonicalization.
 */
export function stripQueryAndFragment(url: string): string {
  return url.trim().split("#")[0].split("?")[0];
}
