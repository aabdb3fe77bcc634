export { BraveSearchClient } from "./braveSearchClient";
export type { BraveSearchClientConfig } from "./braveSearchClient";
