/**
 * Fetched content type definitions
 */

import type { RENDER_STRATEGIES } from "@/constants";

export type ContentKind = "pdf" | "html";

/**
 * Strategy that produced an HTML page's markup
 */
export type RenderStrategy = (typeof RENDER_STRATEGIES)[number];

export type FetchedContent = {
  kind: ContentKind;
  /** Markup, present only for HTML pages (needed for DOM-level checks) */
  raw?: string;
  /** Whitespace-collapsed plain text */
  text: string;
  /** Set for HTML pages */
  renderStrategy?: RenderStrategy;
};

/**
 * Outcome of the two-step render (dynamic first, static fallback)
 */
export type RenderResult = {
  strategy: RenderStrategy;
  html: string;
};
