/**
 * Sitemap and robots.txt parsing
 */

import { load } from "cheerio";
import { gunzipSync } from "zlib";
import type { SitemapDocument } from "@/types";

const GZIP_MAGIC = [0x1f, 0x8b];

/**
 * Sitemap URLs declared in robots.txt ("Sitemap: <url>" lines)
 */
export function parseRobotsSitemaps(robotsTxt: string): string[] {
  const sitemaps: string[] = [];
  for (const rawLine of robotsTxt.split(/\r?\n/)) {
    const match = /^\s*sitemap\s*:\s*(\S+)/i.exec(rawLine);
    if (match) {
      sitemaps.push(match[1]);
    }
  }
  return sitemaps;
}

/**
 * Decode a sitemap body, inflating gzip payloads
 */
export function decodeSitemapBody(body: Buffer): string {
  const gzipped = body.length >= 2 && body[0] === GZIP_MAGIC[0] && body[1] === GZIP_MAGIC[1];
  return (gzipped ? gunzipSync(body) : body).toString("utf-8");
}

function collectLocs(values: string[]): string[] {
  return values.map((value) => value.trim()).filter((value) => value.length > 0);
}

/**
 * Parse a sitemap XML document (sitemapindex or urlset)
 */
export function parseSitemapXml(xml: string): SitemapDocument {
  const $ = load(xml, { xml: true });

  if ($("sitemapindex").length > 0) {
    const sitemaps = collectLocs(
      $("sitemapindex > sitemap > loc")
        .map((_, el) => $(el).text())
        .get(),
    );
    return { kind: "index", sitemaps };
  }

  if ($("urlset").length > 0) {
    const pages = collectLocs(
      $("urlset > url > loc")
        .map((_, el) => $(el).text())
        .get(),
    );
    return { kind: "urlset", pages };
  }

  return { kind: "unknown" };
}
