/**
 * Unit tests for vocabulary validation, compilation and loading
 */

import { describe, it, expect } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { compileVocabulary, loadVocabulary } from "@/vocabulary";
import { VocabularyValidationError, validateVocabularyRaw } from "@/utils";
import { minimalVocabularyRaw } from "../helpers/vocabulary";

describe("validateVocabularyRaw", () => {
  it("should accept a complete vocabulary", () => {
    const raw = minimalVocabularyRaw();
    expect(validateVocabularyRaw(raw)).toEqual(raw);
  });

  it("should reject non-objects", () => {
    expect(() => validateVocabularyRaw([])).toThrow("Vocabulary validation failed: Vocabulary must be an object");
  });

  it("should reject a missing list", () => {
    const { sitemapKeywords: _omitted, ...rest } = minimalVocabularyRaw();
    expect(() => validateVocabularyRaw(rest)).toThrow(
      "Vocabulary validation failed: sitemapKeywords must be an array, got undefined",
    );
  });

  it("should reject an empty required list", () => {
    expect(() => validateVocabularyRaw(minimalVocabularyRaw({ disclosureUrlKeywords: [] }))).toThrow(
      "Vocabulary validation failed: disclosureUrlKeywords cannot be empty",
    );
  });

  it("should allow empty optional lists", () => {
    const raw = minimalVocabularyRaw({ allowedLocales: [], nonPolicyDocumentPatterns: [] });
    expect(validateVocabularyRaw(raw).allowedLocales).toEqual([]);
  });

  it("should reject blank entries", () => {
    expect(() => validateVocabularyRaw(minimalVocabularyRaw({ legalSuffixes: ["AG", "  "] }))).toThrow(
      VocabularyValidationError,
    );
  });

  it("should reject malformed locales", () => {
    expect(() => validateVocabularyRaw(minimalVocabularyRaw({ allowedLocales: ["english"] }))).toThrow(
      'Vocabulary validation failed: allowedLocales[0] must look like "xx-yy", got "english"',
    );
  });
});

describe("compileVocabulary", () => {
  it("should lower-case and dedupe matching lists but keep legal suffixes", () => {
    const vocabulary = compileVocabulary(
      minimalVocabularyRaw({
        disclosureUrlKeywords: ["VDP", "vdp", " Security "],
        allowedLocales: ["EN-US"],
        legalSuffixes: ["GmbH"],
      }),
    );

    expect(vocabulary.disclosureUrlKeywords).toEqual(["vdp", "security"]);
    expect(vocabulary.allowedLocales.has("en-us")).toBe(true);
    expect(vocabulary.legalSuffixes).toEqual(["GmbH"]);
    expect(Object.isFrozen(vocabulary)).toBe(true);
    expect(Object.isFrozen(vocabulary.disclosureUrlKeywords)).toBe(true);
  });
});

describe("loadVocabulary", () => {
  it("should load the shipped vocabulary", () => {
    const vocabulary = loadVocabulary();
    expect(vocabulary.searchKeywords).toContain("vulnerability disclosure policy");
    expect(vocabulary.legalSuffixes).toContain("GmbH");
  });

  it("should fail fast on an invalid file", () => {
    const dir = mkdtempSync(join(tmpdir(), "vdp-vocabulary-"));
    const file = join(dir, "vocabulary.json");
    writeFileSync(file, JSON.stringify({ version: "" }));

    try {
      expect(() => loadVocabulary(file)).toThrow(VocabularyValidationError);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
