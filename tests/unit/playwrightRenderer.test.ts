/**
 * Unit tests for the shared headless browser (playwright-core mocked)
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { PlaywrightRenderer, closeBrowser } from "@/content";

const browsers = vi.hoisted(() => {
  const launched: number[] = [];
  const closed: number[] = [];
  const control = { failNextLaunch: false };

  function fakeBrowser(id: number) {
    return {
      isConnected: () => true,
      newContext: async () => ({
        newPage: async () => ({
          goto: async () => null,
          content: async () => `browser-${id}`,
        }),
        close: async () => undefined,
      }),
      close: async () => {
        closed.push(id);
      },
    };
  }

  async function launch() {
    if (control.failNextLaunch) {
      control.failNextLaunch = false;
      throw new Error("no chromium");
    }
    const id = launched.length;
    launched.push(id);
    await new Promise((resolve) => setTimeout(resolve, 20));
    return fakeBrowser(id);
  }

  return { launched, closed, control, launch };
});

vi.mock("playwright-core", () => ({
  chromium: { launch: browsers.launch },
}));

describe("PlaywrightRenderer", () => {
  beforeEach(() => {
    browsers.launched.length = 0;
    browsers.closed.length = 0;
    browsers.control.failNextLaunch = false;
  });

  afterEach(async () => {
    await closeBrowser();
  });

  it("shares one browser between concurrent renders and closes it", async () => {
    const renderer = new PlaywrightRenderer();

    const pages = await Promise.all([
      renderer.render("https://a.example/vdp"),
      renderer.render("https://b.example/vdp"),
    ]);
    await closeBrowser();

    expect(pages).toEqual(["browser-0", "browser-0"]);
    expect(browsers.launched).toEqual([0]);
    expect(browsers.closed).toEqual([0]);
  });

  it("launches again after a failed launch", async () => {
    const renderer = new PlaywrightRenderer();
    browsers.control.failNextLaunch = true;

    await expect(renderer.render("https://a.example/vdp")).rejects.toThrow("no chromium");
    await expect(renderer.render("https://a.example/vdp")).resolves.toBe("browser-0");
    expect(browsers.launched).toEqual([0]);
  });

  it("launches a new browser after closeBrowser", async () => {
    const renderer = new PlaywrightRenderer();

    await renderer.render("https://a.example/vdp");
    await closeBrowser();
    const page = await renderer.render("https://a.example/vdp");

    expect(page).toBe("browser-1");
    expect(browsers.launched).toEqual([0, 1]);
    expect(browsers.closed).toEqual([0]);
  });
});
