/**
 * Vocabulary loading and compilation
 *
 * Loads the vocabulary JSON, validates it, and compiles it into the frozen
 * runtime form passed to filters, sources and scorers.
 */

import * as fs from "fs";
import * as path from "path";
import type { Vocabulary, VocabularyRaw } from "@/types";
import { validateVocabularyRaw } from "@/utils/vocabularyValidation";
import { VOCABULARY_PATH } from "@/constants";

function lowerCaseUnique(values: readonly string[]): readonly string[] {
  const unique = new Set(values.map((value) => value.trim().toLowerCase()));
  return Object.freeze([...unique]);
}

/**
 * Compiles a validated raw vocabulary into runtime form.
 *
 * Matching lists are lower-cased and deduplicated. Legal suffixes keep their
 * spelling since they are matched case-insensitively as whole words.
 */
export function compileVocabulary(raw: VocabularyRaw): Vocabulary {
  return Object.freeze({
    version: raw.version,
    searchKeywords: Object.freeze(raw.searchKeywords.map((k) => k.trim())),
    companyQueryTerms: Object.freeze(raw.companyQueryTerms.map((t) => t.trim())),
    disclosureUrlKeywords: lowerCaseUnique(raw.disclosureUrlKeywords),
    sitemapKeywords: lowerCaseUnique(raw.sitemapKeywords),
    disallowedKeywords: lowerCaseUnique(raw.disallowedKeywords),
    sitemapDisallowedKeywords: lowerCaseUnique(raw.sitemapDisallowedKeywords),
    disallowedLocaleFragments: lowerCaseUnique(raw.disallowedLocaleFragments),
    allowedLocales: new Set(lowerCaseUnique(raw.allowedLocales)),
    nonPolicyDocumentPatterns: lowerCaseUnique(raw.nonPolicyDocumentPatterns),
    legalSuffixes: Object.freeze(raw.legalSuffixes.map((s) => s.trim())),
  });
}

/**
 * Loads and compiles the vocabulary.
 *
 * The function is fail-fast: any read, parse or validation error throws.
 *
 * @param filePath - Path to the JSON file (defaults to data/vocabulary.json under cwd)
 * @throws {Error} If file cannot be read
 * @throws {SyntaxError} If JSON is malformed
 * @throws {VocabularyValidationError} If validation fails
 */
export function loadVocabulary(filePath: string = VOCABULARY_PATH): Vocabulary {
  const vocabularyPath = path.resolve(process.cwd(), filePath);
  const jsonContent = fs.readFileSync(vocabularyPath, "utf-8");
  const raw: unknown = JSON.parse(jsonContent);
  return compileVocabulary(validateVocabularyRaw(raw));
}
