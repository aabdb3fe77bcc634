export { PolicyExtractor, minimalPolicyRecord } from "./policyExtractor";
export type { PolicyExtractorDeps } from "./policyExtractor";
export { cleanupExtractedFields } from "./cleanupFields";
