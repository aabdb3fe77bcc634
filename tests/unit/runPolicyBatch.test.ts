/**
 * Unit tests for the policy batch runner
 */

import { describe, it, expect, vi } from "vitest";
import { runPolicyBatch } from "@/orchestration";
import type { Company, PolicyResolution } from "@/types";

const alpha: Company = { name: "Alpha AG", baseUrl: "https://alpha.example" };
const beta: Company = { name: "Beta GmbH", baseUrl: "https://beta.example" };
const gamma: Company = { name: "Gamma SE", baseUrl: "https://gamma.example" };

describe("runPolicyBatch", () => {
  it("counts outcomes and turns a throwing resolver into an error resolution", async () => {
    const resolve = async (company: Company): Promise<PolicyResolution> => {
      if (company === alpha) {
        return {
          company,
          status: "found",
          source: "authoritative",
          policyUrl: "https://alpha.example/vdp",
          candidates: ["https://alpha.example/vdp"],
        };
      }
      if (company === beta) {
        return { company, status: "not_found", candidates: [] };
      }
      throw new Error("boom");
    };

    const { results, counters } = await runPolicyBatch([alpha, beta, gamma], { resolve });

    expect(counters).toEqual({ checked: 3, found: 1, notFound: 1, error: 1, persisted: 0 });
    expect(results.map((r) => r.status)).toEqual(["found", "not_found", "error"]);
    expect(results[2]).toEqual({
      company: gamma,
      status: "error",
      candidates: [],
      error: "boom",
    });
  });

  it("keeps going when persistence fails", async () => {
    const persist = vi
      .fn<(resolution: PolicyResolution) => void>()
      .mockImplementationOnce(() => {
        throw new Error("disk full");
      })
      .mockImplementation(() => undefined);

    const { results, counters } = await runPolicyBatch([alpha, beta], {
      resolve: async (company) => ({ company, status: "not_found", candidates: [] }),
      persist,
    });

    expect(persist).toHaveBeenCalledTimes(2);
    expect(counters.persisted).toBe(1);
    expect(counters.notFound).toBe(2);
    expect(results).toHaveLength(2);
  });
});
