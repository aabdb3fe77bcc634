/**
 * Unit tests for company identity utilities
 *
 * Pure, deterministic tokenization and base-URL normalization
 * No DB, no network, no side effects
 */

import { describe, it, expect } from "vitest";
import {
  extractWebsiteDomain,
  firstNameToken,
  normalizeBaseDomain,
  normalizeSiteRoot,
  stripLegalSuffixes,
  tokenizeCompanyName,
} from "@/utils";

const SUFFIXES = ["AG", "GmbH", "SE", "Co KG", "Inc", "LLC", "S.A.", "Ltd", "Pte Ltd", "BV"];

describe("stripLegalSuffixes", () => {
  it("should remove a trailing legal suffix", () => {
    expect(stripLegalSuffixes("Bayer AG", SUFFIXES)).toBe("Bayer");
  });

  it("should match suffixes case-insensitively", () => {
    expect(stripLegalSuffixes("Acme Robotics gmbh", SUFFIXES)).toBe("Acme Robotics");
  });

  it("should prefer the longest suffix", () => {
    expect(stripLegalSuffixes("Acme Shipping Pte Ltd", SUFFIXES)).toBe("Acme Shipping");
  });

  it("should handle dotted suffixes", () => {
    expect(stripLegalSuffixes("Telefonica S.A.", SUFFIXES)).toBe("Telefonica");
  });

  it("should not strip a suffix embedded in a word", () => {
    expect(stripLegalSuffixes("Agrarhandel SEED", SUFFIXES)).toBe("Agrarhandel SEED");
  });
});

describe("tokenizeCompanyName", () => {
  it("should split strong tokens and acronyms", () => {
    const tokens = tokenizeCompanyName("ZF Friedrichshafen AG", SUFFIXES);
    expect([...tokens.strongTokens]).toEqual(["friedrichshafen"]);
    expect([...tokens.acronyms]).toEqual(["zf"]);
  });

  it("should drop tokens shorter than five characters", () => {
    const tokens = tokenizeCompanyName("Example Corp AG", SUFFIXES);
    expect([...tokens.strongTokens]).toEqual(["example"]);
    expect(tokens.acronyms.size).toBe(0);
  });

  it("should remove diacritics and split on hyphens", () => {
    const tokens = tokenizeCompanyName("EnBW Energie Baden-Württemberg AG", SUFFIXES);
    expect([...tokens.strongTokens]).toEqual(["energie", "baden", "wurttemberg"]);
    // "EnBW" is mixed case and shorter than 5 characters
    expect(tokens.acronyms.size).toBe(0);
  });

  it("should treat an all-uppercase short name as an acronym only", () => {
    const tokens = tokenizeCompanyName("BMW AG", SUFFIXES);
    expect(tokens.strongTokens.size).toBe(0);
    expect([...tokens.acronyms]).toEqual(["bmw"]);
  });

  it("should drop short mixed-case tokens", () => {
    const tokens = tokenizeCompanyName("Acme Inc", SUFFIXES);
    expect(tokens.strongTokens.size).toBe(0);
    expect(tokens.acronyms.size).toBe(0);
  });

  it("should return empty sets for a name made only of suffixes", () => {
    const tokens = tokenizeCompanyName("GmbH", SUFFIXES);
    expect(tokens.strongTokens.size).toBe(0);
    expect(tokens.acronyms.size).toBe(0);
  });
});

describe("firstNameToken", () => {
  it("should return the first whitespace-separated token", () => {
    expect(firstNameToken("  Deutsche Telekom AG ")).toBe("Deutsche");
  });

  it("should return an empty string for an empty name", () => {
    expect(firstNameToken("")).toBe("");
  });
});

describe("extractWebsiteDomain", () => {
  it("should strip www and lowercase the host", () => {
    expect(extractWebsiteDomain("https://WWW.Example.com/path")).toBe("example.com");
  });

  it("should return null for malformed or dotless hosts", () => {
    expect(extractWebsiteDomain("not a url")).toBeNull();
    expect(extractWebsiteDomain("http://localhost:3000")).toBeNull();
    expect(extractWebsiteDomain("")).toBeNull();
  });
});

describe("normalizeBaseDomain", () => {
  it("should accept a bare domain", () => {
    expect(normalizeBaseDomain("enbw.com")).toBe("enbw.com");
  });

  it("should strip scheme, www and path", () => {
    expect(normalizeBaseDomain("https://www.bayer.com/de/")).toBe("bayer.com");
  });

  it("should return null for unusable input", () => {
    expect(normalizeBaseDomain("")).toBeNull();
    expect(normalizeBaseDomain("intranet")).toBeNull();
  });
});

describe("normalizeSiteRoot", () => {
  it("should build an https root and keep www", () => {
    expect(normalizeSiteRoot("www.enbw.com/de")).toBe("https://www.enbw.com/");
  });

  it("should force https and drop port and path", () => {
    expect(normalizeSiteRoot("http://Example.COM:8080/x")).toBe("https://example.com/");
  });

  it("should return null for a dotless host", () => {
    expect(normalizeSiteRoot("intranet")).toBeNull();
  });
});
