/**
 * Composition root: wires the resolver's collaborators from configuration
 */

import type { DiscoverySource, PageRenderer, SearchClient } from "@/interfaces";
import type { RuntimeConfig, SearchBackend, Vocabulary } from "@/types";
import { AnthropicPolicyOracle } from "@/clients/anthropic";
import { BraveSearchClient } from "@/clients/brave";
import { GoogleSearchClient } from "@/clients/googleSearch";
import { ContentFetcher, PlaywrightRenderer } from "@/content";
import { SearchSource, SecurityTxtSource, SitemapSource } from "@/discovery";
import { PolicyExtractor } from "@/extraction";
import { createConfidenceScorer } from "@/scoring";
import type { ResolverDeps } from "./policyResolver";

function createSearchClient(backend: SearchBackend, config: RuntimeConfig): SearchClient {
  switch (backend) {
    case "brave":
      if (!config.brave) {
        throw new Error("Brave backend selected without Brave configuration");
      }
      return new BraveSearchClient(config.brave);
    case "google":
      if (!config.google) {
        throw new Error("Google backend selected without Google configuration");
      }
      return new GoogleSearchClient(config.google);
  }
}

/**
 * Discovery sources in execution order: each search backend, then the sitemap
 */
export function createDiscoverySources(
  config: RuntimeConfig,
  vocabulary: Vocabulary,
): DiscoverySource[] {
  const sources: DiscoverySource[] = config.searchBackends.map(
    (backend) =>
      new SearchSource({
        client: createSearchClient(backend, config),
        vocabulary,
        queryKinds: config.searchQueryClasses,
      }),
  );

  if (config.enableSitemap) {
    sources.push(new SitemapSource({ vocabulary }));
  }

  return sources;
}

export function buildResolverDeps(config: RuntimeConfig, vocabulary: Vocabulary): ResolverDeps {
  const oracle = new AnthropicPolicyOracle(config.anthropic);

  const renderers: PageRenderer[] = config.dynamicRender ? [new PlaywrightRenderer()] : [];
  const fetcher = new ContentFetcher({ pdfSizeLimitMb: config.pdfSizeLimitMb, renderers });

  return {
    securityTxt: new SecurityTxtSource(),
    sources: createDiscoverySources(config, vocabulary),
    vocabulary,
    fetchContent: (url) => fetcher.fetchContent(url),
    scorer: createConfidenceScorer({ oracle, vocabulary }),
    extractor: new PolicyExtractor({ oracle }),
    options: config.resolution,
  };
}
