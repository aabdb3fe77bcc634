/**
 * Semantic oracle interfaces
 *
 * Relevance rating and structured extraction are separate capabilities so
 * either one can be faked or swapped on its own.
 */

import type { RawPolicyFields } from "@/types";

export type RelevanceRequest = {
  companyName: string;
  url: string;
  /** Leading excerpt of the page text */
  excerpt: string;
};

export type ExtractionRequest = {
  companyName: string;
  url: string;
  text: string;
};

export interface RelevanceOracle {
  /**
   * Rate how likely the page is the company's disclosure policy
   *
   * @returns A number that callers clamp to [0, 1]
   */
  rateRelevance(request: RelevanceRequest): Promise<number>;
}

export interface ExtractionOracle {
  /**
   * Extract the policy attributes from the page text
   *
   * @returns Raw field map, before cleanup
   */
  extractPolicy(request: ExtractionRequest): Promise<RawPolicyFields>;
}
