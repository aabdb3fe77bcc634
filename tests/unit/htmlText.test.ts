/**
 * Unit tests for markup-to-text extraction
 */

import { describe, it, expect } from "vitest";
import { collapseWhitespace, htmlToText } from "@/content";

describe("collapseWhitespace", () => {
  it("should collapse runs of whitespace and trim", () => {
    expect(collapseWhitespace("  a \n\t b  ")).toBe("a b");
  });
});

describe("htmlToText", () => {
  it("should drop scripts and styles and separate blocks", () => {
    const html =
      "<html><head><title>VDP</title><style>p{color:red}</style></head>" +
      "<body><h1>Security</h1><p>Report to <b>psirt</b>@acme.example</p>" +
      "<script>var x = 1;</script><ul><li>One</li><li>Two</li></ul></body></html>";

    expect(htmlToText(html)).toBe("VDP Security Report to psirt@acme.example One Two");
  });

  it("should not merge words of adjacent blocks", () => {
    expect(htmlToText("<div>alpha</div><div>beta</div>")).toBe("alpha beta");
  });

  it("should return an empty string for empty markup", () => {
    expect(htmlToText("")).toBe("");
  });
});
