export { ContentFetcher } from "./contentFetcher";
export type { ContentFetcherConfig } from "./contentFetcher";
export { PlaywrightRenderer, closeBrowser } from "./renderers/playwrightRenderer";
export { htmlToText, collapseWhitespace } from "./htmlText";
export { extractPdfText } from "./pdfText";
