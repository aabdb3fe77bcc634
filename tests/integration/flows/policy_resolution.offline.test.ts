/**
 * Policy resolution flow (offline)
 *
 * Real sources, fetcher, scorer and extractor wired to mocked HTTP and
 * fake oracles:
 * - security.txt fast path skips discovery and scoring
 * - search discovery picks the most confident candidate
 * - nothing above the threshold means not_found
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { createMockHttp, type MockHttp } from "../../helpers/mockHttp";
import { minimalVocabulary } from "../../helpers/vocabulary";
import { resolveCompanyPolicy, type ResolverDeps } from "@/orchestration";
import { SearchSource, SecurityTxtSource } from "@/discovery";
import { ContentFetcher } from "@/content";
import { createConfidenceScorer, type ConfidenceScorer } from "@/scoring";
import { PolicyExtractor } from "@/extraction";
import type {
  DiscoverySource,
  ExtractionOracle,
  RelevanceOracle,
  SearchClient,
} from "@/interfaces";
import type { Company, RawPolicyFields } from "@/types";

const VOCABULARY = minimalVocabulary();
const OPTIONS = { confidenceThreshold: 0.6, maxCandidates: 10, scoringConcurrency: 2 };

function page(title: string): string {
  return `<html><body><h1>${title}</h1><p>Report vulnerabilities to our team.</p></body></html>`;
}

function fakeOracle(
  ratings: Record<string, number>,
  fields: RawPolicyFields,
): RelevanceOracle & ExtractionOracle {
  return {
    rateRelevance: async ({ url }) => ratings[url] ?? 0,
    extractPolicy: async () => fields,
  };
}

function buildDeps(
  mock: MockHttp,
  oracle: RelevanceOracle & ExtractionOracle,
  sources: readonly DiscoverySource[],
  scorer?: ConfidenceScorer,
): ResolverDeps {
  const fetcher = new ContentFetcher({ httpFetch: mock.fetch, renderers: [] });
  return {
    securityTxt: new SecurityTxtSource({ httpFetch: mock.fetch }),
    sources,
    vocabulary: VOCABULARY,
    fetchContent: (url) => fetcher.fetchContent(url),
    scorer: scorer ?? createConfidenceScorer({ oracle, vocabulary: VOCABULARY }),
    extractor: new PolicyExtractor({ oracle }),
    options: OPTIONS,
  };
}

describe("security.txt fast path", () => {
  const company: Company = { name: "EnBW AG", baseUrl: "https://www.enbw.com" };
  let mock: MockHttp;

  beforeEach(() => {
    mock = createMockHttp();
    mock.onRaw("GET", "https://www.enbw.com/.well-known/security.txt", {
      contentType: "text/plain; charset=utf-8",
      body:
        "Contact: mailto:security@enbw.com\n" +
        "Policy: https://www.enbw.com/security/vdp?lang=en\n",
    });
    mock.onRaw("GET", "https://www.enbw.com/security/vdp", {
      contentType: "text/html",
      body: page("Vulnerability Disclosure Policy"),
    });
  });

  it("accepts the Policy field without discovery or scoring", async () => {
    const discover = vi.fn<DiscoverySource["discover"]>().mockResolvedValue([]);
    const score = vi.fn<ConfidenceScorer["score"]>();
    const oracle = fakeOracle(
      {},
      { program_name: "EnBW VDP", policy_url: "self", bounty: null, disclosure_timeline_days: 90 },
    );

    const resolution = await resolveCompanyPolicy(
      company,
      buildDeps(mock, oracle, [{ kind: "search", id: "search:test", discover }], { score }),
    );

    expect(resolution).toEqual({
      company,
      status: "found",
      source: "authoritative",
      securityTxtUrl: "https://www.enbw.com/.well-known/security.txt",
      policyUrl: "https://www.enbw.com/security/vdp?lang=en",
      candidates: ["https://www.enbw.com/security/vdp"],
      record: {
        companyName: "EnBW AG",
        policyUrl: "https://www.enbw.com/security/vdp?lang=en",
        fields: {
          program_name: "EnBW VDP",
          policy_url: "https://www.enbw.com/security/vdp?lang=en",
          disclosure_timeline_days: 90,
        },
      },
    });
    expect(resolution.confidence).toBeUndefined();
    expect(discover).not.toHaveBeenCalled();
    expect(score).not.toHaveBeenCalled();
  });
});

describe("search discovery", () => {
  const company: Company = { name: "Acmecorp AG", baseUrl: "https://acmecorp.example" };
  const VDP_URL = "https://acmecorp.example/security/vdp";
  const CONTACT_URL = "https://acmecorp.example/security/contact";
  let mock: MockHttp;
  let searchSource: SearchSource;

  beforeEach(() => {
    mock = createMockHttp();
    mock.onRaw("GET", "https://acmecorp.example/.well-known/security.txt", { status: 404 });
    mock.onRaw("GET", "https://acmecorp.example/security.txt", { status: 404 });
    mock.onRaw("GET", VDP_URL, { body: page("Vulnerability Disclosure Policy") });
    mock.onRaw("GET", CONTACT_URL, { body: page("Security contact") });

    const client: SearchClient = {
      backend: "brave",
      search: async () => [`${VDP_URL}?ref=search`, CONTACT_URL],
    };
    searchSource = new SearchSource({
      client,
      vocabulary: VOCABULARY,
      queryKinds: ["site"],
      interQueryDelayMs: 0,
    });
  });

  it("selects the candidate with the highest confidence above the threshold", async () => {
    const oracle = fakeOracle(
      { [VDP_URL]: 0.75, [CONTACT_URL]: 0.3 },
      { program_name: "Acmecorp VDP", safe_harbor: "" },
    );

    const resolution = await resolveCompanyPolicy(
      company,
      buildDeps(mock, oracle, [searchSource]),
    );

    expect(resolution).toEqual({
      company,
      status: "found",
      source: "search",
      policyUrl: VDP_URL,
      confidence: 0.75,
      candidates: [VDP_URL, CONTACT_URL],
      record: {
        companyName: "Acmecorp AG",
        policyUrl: VDP_URL,
        fields: { program_name: "Acmecorp VDP" },
      },
    });

    // The winning page is extracted from the content fetched for scoring
    const pageRequests = mock.getRecordedRequests().filter((req) => req.url === VDP_URL);
    expect(pageRequests).toHaveLength(1);
  });

  it("reports not_found when no candidate clears the threshold", async () => {
    const oracle = fakeOracle({ [VDP_URL]: 0.6, [CONTACT_URL]: 0.5 }, {});

    const resolution = await resolveCompanyPolicy(
      company,
      buildDeps(mock, oracle, [searchSource]),
    );

    expect(resolution).toEqual({
      company,
      status: "not_found",
      candidates: [VDP_URL, CONTACT_URL],
    });
  });
});
