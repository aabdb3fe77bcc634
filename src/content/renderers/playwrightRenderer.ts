/**
 * PlaywrightRenderer: dynamic rendering in headless Chromium
 *
 * Uses playwright-core against an installed Chromium. A single browser is
 * shared by every render and closed by closeBrowser() at the end of a run.
 */

import type { Browser } from "playwright-core";
import type { PageRenderer } from "@/interfaces";
import type { RenderStrategy } from "@/types";
import { CONTENT, HTTP } from "@/constants";
import * as logger from "@/logger";

let browserInstance: Browser | null = null;
let launching: Promise<Browser> | null = null;

async function launchBrowser(): Promise<Browser> {
  const { chromium } = await import("playwright-core");
  const browser = await chromium.launch({
    headless: true,
    args: ["--disable-gpu", "--disable-dev-shm-usage", "--no-sandbox"],
  });
  logger.debug("Headless browser launched");
  return browser;
}

/**
 * Get or create the shared browser instance
 *
 * Concurrent callers share one pending launch. A failed launch or a
 * disconnected browser is retried on the next call.
 */
function getBrowser(): Promise<Browser> {
  if (browserInstance && browserInstance.isConnected()) {
    return Promise.resolve(browserInstance);
  }
  if (!launching) {
    launching = launchBrowser().then(
      (browser) => {
        browserInstance = browser;
        launching = null;
        return browser;
      },
      (error: unknown) => {
        launching = null;
        throw error;
      },
    );
  }
  return launching;
}

/**
 * Close the shared browser instance, if any (waits for a pending launch)
 */
export async function closeBrowser(): Promise<void> {
  if (launching) {
    try {
      await launching;
    } catch (error) {
      logger.debug("Browser launch failed before close", {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
  const browser = browserInstance;
  browserInstance = null;
  if (browser) {
    await browser.close();
  }
}

export interface PlaywrightRendererConfig {
  /** Page load timeout in milliseconds */
  timeoutMs?: number;
}

export class PlaywrightRenderer implements PageRenderer {
  readonly strategy: RenderStrategy = "dynamic";

  private readonly timeoutMs: number;

  constructor(config?: PlaywrightRendererConfig) {
    this.timeoutMs = config?.timeoutMs ?? CONTENT.RENDER_TIMEOUT_MS;
  }

  async render(url: string): Promise<string> {
    const browser = await getBrowser();
    const context = await browser.newContext({
      userAgent: HTTP.HEADERS["User-Agent"],
    });

    try {
      const page = await context.newPage();
      await page.goto(url, { waitUntil: "domcontentloaded", timeout: this.timeoutMs });
      return await page.content();
    } finally {
      await context.close();
    }
  }
}
