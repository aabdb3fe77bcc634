/**
 * Discovery barrel exports
 */

export { canonicalizeUrl, stripQueryAndFragment } from "./urlCanonicalizer";
export {
  isRelevantUrl,
  isExcludedSitemapUrl,
  isExternalPlatformHost,
  isExternalPlatformUrl,
  hostnameMatchesCompany,
  pathNamesCompany,
} from "./relevanceFilter";
export { parseSecurityTxt, firstFieldValue } from "./securityTxtParser";
export { parseRobotsSitemaps, parseSitemapXml, decodeSitemapBody } from "./sitemapParser";
export {
  collectCandidates,
  buildRelevanceContext,
  orderInternalFirst,
} from "./collectCandidates";
export { SecurityTxtSource } from "./sources/securityTxtSource";
export { SearchSource, buildSearchQueries } from "./sources/searchSource";
export { SitemapSource } from "./sources/sitemapSource";
