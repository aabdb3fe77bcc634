/**
 * Runtime configuration type definitions
 */

import type { SEARCH_BACKENDS } from "@/constants";
import type { SearchQueryKind } from "./discovery";
import type { LogLevel } from "./logger";

export type SearchBackend = (typeof SEARCH_BACKENDS)[number];

export type ResolutionOptions = {
  /** A candidate must score strictly above this to be eligible */
  confidenceThreshold: number;
  /** Maximum number of candidates fetched and scored per company */
  maxCandidates: number;
  /** Parallel fetch+score workers per company */
  scoringConcurrency: number;
};

export type RuntimeConfig = {
  logLevel: LogLevel;
  dbPath: string | undefined;
  anthropic: {
    apiKey: string;
    model: string;
  };
  searchBackends: SearchBackend[];
  /** Query classes the search adapter builds */
  searchQueryClasses: SearchQueryKind[];
  brave?: {
    apiKey: string;
    country: string;
    searchLang: string;
  };
  google?: {
    apiKey: string;
    cseId: string;
  };
  resolution: ResolutionOptions;
  pdfSizeLimitMb: number;
  dynamicRender: boolean;
  enableSitemap: boolean;
};
