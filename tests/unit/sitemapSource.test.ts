/**
 * Unit tests for sitemap discovery
 */

import { describe, it, expect, beforeEach } from "vitest";
import { gzipSync } from "zlib";
import { SitemapSource } from "@/discovery";
import { createMockHttp } from "../helpers/mockHttp";
import type { MockHttp } from "../helpers/mockHttp";
import { minimalVocabulary } from "../helpers/vocabulary";

const vocabulary = minimalVocabulary();
const company = { name: "Example Industries AG", baseUrl: "example.com" };

function urlset(pages: string[]): string {
  const entries = pages.map((page) => `<url><loc>${page}</loc></url>`).join("");
  return `<?xml version="1.0"?><urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">${entries}</urlset>`;
}

function sitemapIndex(children: string[]): string {
  const entries = children.map((child) => `<sitemap><loc>${child}</loc></sitemap>`).join("");
  return `<?xml version="1.0"?><sitemapindex xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">${entries}</sitemapindex>`;
}

describe("SitemapSource", () => {
  let mock: MockHttp;

  beforeEach(() => {
    mock = createMockHttp();
  });

  it("should walk robots-declared indexes into gzip urlsets and filter pages", async () => {
    mock.onRaw("GET", "https://example.com/robots.txt", {
      contentType: "text/plain",
      body: "User-agent: *\nSitemap: https://example.com/sitemap-main.xml\n",
    });
    mock.onRaw("GET", "https://example.com/sitemap-main.xml", {
      contentType: "application/xml",
      body: sitemapIndex(["https://example.com/sitemap-pages.xml.gz"]),
    });
    mock.onRaw("GET", "https://example.com/sitemap-pages.xml.gz", {
      contentType: "application/x-gzip",
      body: gzipSync(
        Buffer.from(
          urlset([
            "https://example.com/",
            "https://example.com/security/vdp",
            "https://example.com/security/vulnerability-disclosure",
            "https://example.com/careers/security",
            "https://example.com/fr/security/vdp",
            "https://example.com/2019/vdp",
            "https://example.com/about",
          ]),
        ),
      ),
    });

    const source = new SitemapSource({ vocabulary, httpFetch: mock.fetch });
    const urls = await source.discover({ company, keywords: [] });

    expect(urls).toEqual([
      "https://example.com/security/vdp",
      "https://example.com/security/vulnerability-disclosure",
    ]);
  });

  it("should probe the conventional locations when robots.txt is missing", async () => {
    mock.onRaw("GET", "https://example.com/robots.txt", { status: 404 });
    mock.onRaw("GET", "https://example.com/sitemap.xml", {
      contentType: "application/xml",
      body: urlset(["https://example.com/psirt"]),
    });

    const source = new SitemapSource({ vocabulary, httpFetch: mock.fetch });
    expect(await source.discover({ company, keywords: [] })).toEqual(["https://example.com/psirt"]);
  });

  it("should return nothing when no sitemap can be read", async () => {
    mock.onRaw("GET", "https://example.com/robots.txt", { status: 404 });
    mock.onRaw("GET", "https://example.com/sitemap.xml", { status: 404 });
    mock.onRaw("GET", "https://example.com/sitemap_index.xml", {
      contentType: "text/html",
      body: "<html>not a sitemap</html>",
    });

    const source = new SitemapSource({ vocabulary, httpFetch: mock.fetch });
    expect(await source.collectPages("https://example.com/")).toBeNull();
    expect(await source.discover({ company, keywords: [] })).toEqual([]);
  });

  it("should not descend indexes deeper than the depth limit", async () => {
    mock.onRaw("GET", "https://example.com/robots.txt", { status: 404 });
    mock.onRaw("GET", "https://example.com/sitemap.xml", {
      contentType: "application/xml",
      body: sitemapIndex(["https://example.com/sitemap-child.xml"]),
    });

    const source = new SitemapSource({
      vocabulary,
      httpFetch: mock.fetch,
      limits: { MAX_DEPTH: 0 },
    });

    expect(await source.collectPages("https://example.com/")).toEqual([]);
    expect(mock.getRecordedRequests().map((r) => r.url)).not.toContain(
      "https://example.com/sitemap-child.xml",
    );
  });

  it("should stop collecting at the page cap", async () => {
    mock.onRaw("GET", "https://example.com/robots.txt", { status: 404 });
    mock.onRaw("GET", "https://example.com/sitemap.xml", {
      contentType: "application/xml",
      body: urlset(["https://example.com/a", "https://example.com/b", "https://example.com/c"]),
    });

    const source = new SitemapSource({
      vocabulary,
      httpFetch: mock.fetch,
      limits: { MAX_PAGES: 2 },
    });

    expect(await source.collectPages("https://example.com/")).toEqual([
      "https://example.com/a",
      "https://example.com/b",
    ]);
  });
});
