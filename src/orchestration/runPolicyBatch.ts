/**
 * Policy batch runner
 *
 * Resolves companies sequentially, persists each resolution when a sink is
 * given, and tracks outcomes.
 */

import type { BatchCounters, BatchResult, Company, PolicyResolution } from "@/types";
import { errorMessage } from "@/utils/failures";
import * as logger from "@/logger";

export interface RunPolicyBatchOptions {
  resolve: (company: Company) => Promise<PolicyResolution>;
  /** Optional sink for each resolution (e.g. the policy_runs table) */
  persist?: (resolution: PolicyResolution) => void;
}

/**
 * Run the resolver over every company
 *
 * A failing persistence never stops the batch; the resolution is still
 * returned.
 */
export async function runPolicyBatch(
  companies: readonly Company[],
  options: RunPolicyBatchOptions,
): Promise<BatchResult> {
  logger.info("Starting policy batch", { companies: companies.length });

  const counters: BatchCounters = {
    checked: 0,
    found: 0,
    notFound: 0,
    error: 0,
    persisted: 0,
  };
  const results: PolicyResolution[] = [];

  for (const company of companies) {
    counters.checked++;

    let resolution: PolicyResolution;
    try {
      resolution = await options.resolve(company);
    } catch (error) {
      // Resolvers report failures in the resolution; this is a last resort
      logger.warn("Unexpected error during policy resolution", {
        company: company.name,
        error: errorMessage(error),
      });
      resolution = {
        company,
        status: "error",
        candidates: [],
        error: errorMessage(error),
      };
    }

    if (resolution.status === "found") {
      counters.found++;
    } else if (resolution.status === "not_found") {
      counters.notFound++;
    } else {
      counters.error++;
    }

    if (options.persist) {
      try {
        options.persist(resolution);
        counters.persisted++;
      } catch (persistError) {
        logger.warn("Failed to persist policy resolution", {
          company: company.name,
          error: errorMessage(persistError),
        });
      }
    }

    results.push(resolution);
  }

  logger.info("Policy batch complete", { ...counters });

  return { results, counters };
}
