/**
 * PageRenderer interface: produces final markup for a URL
 */

import type { RenderStrategy } from "@/types";

export interface PageRenderer {
  readonly strategy: RenderStrategy;

  /**
   * Render the page and return its markup
   *
   * Rejects when the page cannot be rendered; an empty string counts as no
   * result and sends the caller to the next renderer.
   */
  render(url: string): Promise<string>;
}
