/**
 * Company type definitions
 */

/**
 * Unit of work supplied by the batch driver
 */
export type Company = {
  /** Display name as provided by the input (legal suffixes included) */
  readonly name: string;
  /** Company website, with or without scheme (e.g. "enbw.com", "https://www.bayer.com/") */
  readonly baseUrl: string;
};

/**
 * Tokens derived from a company name for URL matching
 *
 * Both sets hold lower-cased values.
 */
export type CompanyTokens = {
  /** Tokens of at least 5 characters */
  strongTokens: ReadonlySet<string>;
  /** All-uppercase tokens of 2-5 characters (e.g. "ZF", "BMW") */
  acronyms: ReadonlySet<string>;
};
