/**
 * Orchestration barrel exports
 */

export { resolveCompanyPolicy } from "./policyResolver";
export type { ResolverDeps } from "./policyResolver";
export { runPolicyBatch } from "./runPolicyBatch";
export type { RunPolicyBatchOptions } from "./runPolicyBatch";
export { buildResolverDeps, createDiscoverySources } from "./buildResolverDeps";
