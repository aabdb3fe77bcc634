export {
  createConfidenceScorer,
  createStrategyChain,
  clampConfidence,
  nonPolicyDocumentStrategy,
  hackerOneProgramStrategy,
  oracleStrategy,
} from "./confidenceScorer";
export type { ConfidenceScorer, ConfidenceScorerDeps } from "./confidenceScorer";
export { scoreCandidates, selectBestCandidate } from "./selectionPolicy";
export type { FetchContentFn, ScoreCandidatesOptions, ScoringRound } from "./selectionPolicy";
