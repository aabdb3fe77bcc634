/**
 * Unit tests for candidate aggregation
 */

import { describe, it, expect, vi } from "vitest";
import { collectCandidates } from "@/discovery";
import type { DiscoverySource } from "@/interfaces";
import type { CandidateSource, Company, DiscoveryQuery } from "@/types";
import { minimalVocabulary } from "../helpers/vocabulary";

const company: Company = { name: "Acmecorp AG", baseUrl: "https://www.acmecorp.example" };

function fakeSource(
  kind: CandidateSource,
  id: string,
  discover: (query: DiscoveryQuery) => Promise<string[]>,
): DiscoverySource {
  return { kind, id, discover };
}

const searchSource = fakeSource("search", "search:test", async () => [
  "https://acmecorp.example/security/vdp",
  "https://hackerone.com/acmecorp/vdp-updates",
  "https://acmecorp.example/careers/security",
  "https://other.example/security",
  "https://acmecorp.example/security/vdp?utm=1",
  "https://acmecorp.example/security/" + "a".repeat(500),
]);

const brokenSource = fakeSource("search", "search:broken", async () => {
  throw new Error("backend down");
});

const sitemapSource = fakeSource("sitemap", "sitemap", async () => [
  "https://acmecorp.example/news/security",
  "https://acmecorp.example/psirt",
  "https://acmecorp.example/security/vdp#top",
]);

describe("collectCandidates", () => {
  it("tags, filters, deduplicates and orders candidates internal-first", async () => {
    const candidates = await collectCandidates(company, ["vdp"], {
      sources: [searchSource, brokenSource, sitemapSource],
      vocabulary: minimalVocabulary(),
    });

    expect(candidates).toEqual([
      {
        url: "https://acmecorp.example/security/vdp",
        source: "search",
        canonicalUrl: "https://acmecorp.example/security/vdp",
      },
      {
        url: "https://acmecorp.example/news/security",
        source: "sitemap",
        canonicalUrl: "https://acmecorp.example/news/security",
      },
      {
        url: "https://acmecorp.example/psirt",
        source: "sitemap",
        canonicalUrl: "https://acmecorp.example/psirt",
      },
      {
        url: "https://hackerone.com/acmecorp",
        source: "external_platform",
        canonicalUrl: "https://hackerone.com/acmecorp",
      },
    ]);
  });

  it("caps the ordered list", async () => {
    const candidates = await collectCandidates(company, ["vdp"], {
      sources: [searchSource, sitemapSource],
      vocabulary: minimalVocabulary(),
      maxCandidates: 2,
    });

    expect(candidates.map((c) => c.url)).toEqual([
      "https://acmecorp.example/security/vdp",
      "https://acmecorp.example/news/security",
    ]);
  });

  it("passes the company and keywords to every source", async () => {
    const discover = vi.fn<(query: DiscoveryQuery) => Promise<string[]>>().mockResolvedValue([]);

    const candidates = await collectCandidates(company, ["vdp", "psirt"], {
      sources: [fakeSource("sitemap", "sitemap", discover)],
      vocabulary: minimalVocabulary(),
    });

    expect(candidates).toEqual([]);
    expect(discover).toHaveBeenCalledWith({ company, keywords: ["vdp", "psirt"] });
  });
});
