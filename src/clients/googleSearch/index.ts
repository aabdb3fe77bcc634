export { GoogleSearchClient } from "./googleSearchClient";
export type { GoogleSearchClientConfig } from "./googleSearchClient";
