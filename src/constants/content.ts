/**
 * Content fetching constants
 */

/**
 * Render strategies in the order they are attempted
 */
export const RENDER_STRATEGIES = ["dynamic", "static"] as const;

export const CONTENT = {
  /** Default PDF size ceiling in megabytes */
  DEFAULT_PDF_SIZE_LIMIT_MB: 1,
  /** Page load timeout for the dynamic renderer */
  RENDER_TIMEOUT_MS: 20_000,
  /** Elements removed before extracting text from markup */
  NOISE_SELECTORS: "script,noscript,style,svg,iframe,template",
  /** Elements that end a line of text */
  BLOCK_SELECTORS:
    "p,div,li,ul,ol,br,h1,h2,h3,h4,h5,h6,tr,td,th,section,article,header,footer,nav,aside,main,title,dt,dd,pre,blockquote",
};

/**
 * Content types treated as markup/text
 */
export const TEXT_LIKE_CONTENT_TYPES = [
  "text/",
  "application/xhtml+xml",
];

export const PDF_CONTENT_TYPE = "application/pdf";

export const BYTES_PER_MB = 1024 * 1024;
