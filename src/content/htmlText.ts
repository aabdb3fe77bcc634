/**
 * Plain-text extraction from markup
 */

import { load } from "cheerio";
import { CONTENT } from "@/constants";

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Extract whitespace-collapsed text from HTML
 *
 * Scripts, styles and other non-visible elements are removed; block
 * elements are separated by a space so adjacent words never merge.
 */
export function htmlToText(html: string): string {
  const $ = load(html);
  $(CONTENT.NOISE_SELECTORS).remove();
  $(CONTENT.BLOCK_SELECTORS).after(" ");
  return collapseWhitespace($.root().text());
}
