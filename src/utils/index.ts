/**
 * Utils barrel exports
 */

export * from "./identity/companyIdentity";
export * from "./text/removeDiacritics";
export * from "./failures";
export * from "./vocabularyValidation";
