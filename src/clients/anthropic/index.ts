export { AnthropicPolicyOracle, extractJsonPayload } from "./anthropicPolicyOracle";
export type { AnthropicPolicyOracleConfig, CompleteFn } from "./anthropicPolicyOracle";
