/**
 * DiscoverySource interface: contract for candidate URL sources
 *
 * Sources fail soft: an unreachable backend or a malformed document yields
 * an empty list (logged with a failure code), never a rejection.
 */

import type { CandidateSource, DiscoveryQuery } from "@/types";

export interface DiscoverySource {
  /**
   * Tag attached to the candidates this source produces
   */
  readonly kind: CandidateSource;

  /**
   * Unique identifier used in logs
   */
  readonly id: string;

  /**
   * Discover URLs that may host the company's disclosure policy
   *
   * @returns Promise resolving to URLs in first-seen order
   */
  discover(query: DiscoveryQuery): Promise<string[]>;
}
