/**
 * Unit tests for URL canonicalization
 */

import { describe, it, expect } from "vitest";
import { canonicalizeUrl, stripQueryAndFragment } from "@/discovery";

describe("canonicalizeUrl", () => {
  it("should drop query and fragment from generic URLs", () => {
    expect(canonicalizeUrl("https://example.com/Security/VDP?utm=1#top")).toBe(
      "https://example.com/Security/VDP",
    );
  });

  it("should lowercase the host", () => {
    expect(canonicalizeUrl("https://Example.COM/vdp")).toBe("https://example.com/vdp");
  });

  it("should keep the root path", () => {
    expect(canonicalizeUrl("https://example.com")).toBe("https://example.com/");
  });

  it("should collapse Intigriti program pages to the program root", () => {
    expect(
      canonicalizeUrl("https://app.intigriti.com/programs/acme/acme-vdp/detail?x=1#scope"),
    ).toBe("https://app.intigriti.com/programs/acme/acme-vdp");
  });

  it("should collapse HackerOne program pages to the program root", () => {
    expect(canonicalizeUrl("https://hackerone.com/acme/policy_scopes")).toBe(
      "https://hackerone.com/acme",
    );
    expect(canonicalizeUrl("https://www.hackerone.com/acme?type=team")).toBe(
      "https://www.hackerone.com/acme",
    );
  });

  it("should leave a platform root without a program untouched", () => {
    expect(canonicalizeUrl("https://hackerone.com/")).toBe("https://hackerone.com/");
  });

  it("should keep HackerOne subpages of one program on the same key", () => {
    expect(canonicalizeUrl("https://hackerone.com/program-x/detail")).toBe(
      "https://hackerone.com/program-x",
    );
    expect(canonicalizeUrl("https://hackerone.com/program-x/updates")).toBe(
      canonicalizeUrl("https://hackerone.com/program-x/detail"),
    );
  });

  it("should only strip query and fragment for non-web schemes", () => {
    expect(canonicalizeUrl(" mailto:security@acme.example?subject=vdp ")).toBe(
      "mailto:security@acme.example",
    );
  });

  it("should return unparseable input trimmed", () => {
    expect(canonicalizeUrl("  not a url ")).toBe("not a url");
  });

  it("should be idempotent", () => {
    const urls = [
      "https://app.intigriti.com/programs/acme/acme-vdp/detail",
      "https://hackerone.com/acme/thanks",
      "https://example.com/a/b?c=d",
      "mailto:security@acme.example",
    ];
    for (const url of urls) {
      const once = canonicalizeUrl(url);
      expect(canonicalizeUrl(once)).toBe(once);
    }
  });
});

describe("stripQueryAndFragment", () => {
  it("should remove query and fragment only", () => {
    expect(stripQueryAndFragment(" https://Example.com/x?y=1#z ")).toBe("https://Example.com/x");
  });
});
