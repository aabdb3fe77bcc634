/**
 * Interfaces barrel exports
 */

export type { DiscoverySource } from "./discovery/discoverySource";
export type { SearchClient } from "./clients/searchClient";
export type {
  RelevanceOracle,
  ExtractionOracle,
  RelevanceRequest,
  ExtractionRequest,
} from "./oracle/policyOracle";
export type { PageRenderer } from "./content/pageRenderer";
