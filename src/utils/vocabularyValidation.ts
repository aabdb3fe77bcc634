/**
 * Vocabulary validation module
 *
 * Validates the vocabulary JSON structure and enforces invariants:
 * - Every list is present and holds only non-empty strings
 * - Lists that drive matching are non-empty
 * - Locales use the "xx-yy" form
 *
 * Validation is fail-fast: throws on the first error.
 */

import type { VocabularyRaw } from "@/types";

/**
 * Error thrown when vocabulary validation fails.
 */
export class VocabularyValidationError extends Error {
  constructor(message: string) {
    super(`Vocabulary validation failed: ${message}`);
    this.name = "VocabularyValidationError";
  }
}

type StringListField = Exclude<keyof VocabularyRaw, "version">;

/**
 * Lists that may be empty (feature simply inactive)
 */
const OPTIONAL_LISTS: ReadonlySet<StringListField> = new Set([
  "disallowedLocaleFragments",
  "allowedLocales",
  "nonPolicyDocumentPatterns",
]);

const LOCALE_PATTERN = /^[a-z]{2,3}-[a-z]{2,3}$/i;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates that a value is a non-empty string.
 *
 * @param fieldPath - Field path for error messages (e.g., "searchKeywords[0]")
 */
function validateNonEmptyString(
  value: unknown,
  fieldPath: string,
): asserts value is string {
  if (typeof value !== "string") {
    throw new VocabularyValidationError(
      `${fieldPath} must be a string, got ${typeof value}`,
    );
  }
  if (value.trim().length === 0) {
    throw new VocabularyValidationError(
      `${fieldPath} cannot be empty or whitespace-only`,
    );
  }
}

/**
 * Validates a list of strings and returns it typed.
 */
function validateStringList(
  value: unknown,
  field: StringListField,
): string[] {
  if (!Array.isArray(value)) {
    throw new VocabularyValidationError(
      `${field} must be an array, got ${typeof value}`,
    );
  }
  if (value.length === 0 && !OPTIONAL_LISTS.has(field)) {
    throw new VocabularyValidationError(`${field} cannot be empty`);
  }

  const items: string[] = [];
  value.forEach((item: unknown, index) => {
    validateNonEmptyString(item, `${field}[${index}]`);
    items.push(item);
  });
  return items;
}

/**
 * Validates raw vocabulary data from JSON.
 *
 * @param raw - Parsed JSON content
 * @returns The validated vocabulary (typed as VocabularyRaw)
 * @throws {VocabularyValidationError} On the first invalid field
 */
export function validateVocabularyRaw(raw: unknown): VocabularyRaw {
  if (!isRecord(raw)) {
    throw new VocabularyValidationError("Vocabulary must be an object");
  }

  const record = raw;
  const version = record.version;
  validateNonEmptyString(version, "version");

  const list = (field: StringListField): string[] =>
    validateStringList(record[field], field);

  const vocabulary: VocabularyRaw = {
    version,
    searchKeywords: list("searchKeywords"),
    companyQueryTerms: list("companyQueryTerms"),
    disclosureUrlKeywords: list("disclosureUrlKeywords"),
    sitemapKeywords: list("sitemapKeywords"),
    disallowedKeywords: list("disallowedKeywords"),
    sitemapDisallowedKeywords: list("sitemapDisallowedKeywords"),
    disallowedLocaleFragments: list("disallowedLocaleFragments"),
    allowedLocales: list("allowedLocales"),
    nonPolicyDocumentPatterns: list("nonPolicyDocumentPatterns"),
    legalSuffixes: list("legalSuffixes"),
  };

  vocabulary.allowedLocales.forEach((locale, index) => {
    if (!LOCALE_PATTERN.test(locale)) {
      throw new VocabularyValidationError(
        `allowedLocales[${index}] must look like "xx-yy", got "${locale}"`,
      );
    }
  });

  return vocabulary;
}
