/**
 * HTTP client type definitions
 */

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD";

/**
 * Retry configuration for HTTP requests
 */
export interface HttpRetryConfig {
  /** Maximum number of attempts (including initial request). Default from constants. */
  maxAttempts?: number;
  /** Base delay in ms for exponential backoff. Default from constants. */
  baseDelayMs?: number;
  /** Maximum delay in ms between retries. Default from constants. */
  maxDelayMs?: number;
  /** Maximum time in ms to wait for Retry-After header. Default from constants. */
  maxRetryAfterMs?: number;
}

/**
 * Response metadata available before the body is read
 */
export interface HttpResponseMeta {
  status: number;
  contentType: string | null;
  /** Declared Content-Length, null when absent or invalid */
  contentLength: number | null;
}

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean | Array<string | number | boolean>>;
  json?: unknown;
  timeoutMs?: number;
  retry?: HttpRetryConfig;
  /**
   * Raw fetches only: when this returns true the body is not downloaded
   * and the response comes back with an empty body and bodySkipped set
   */
  skipBody?: (meta: HttpResponseMeta) => boolean;
}

/**
 * Raw response returned by httpFetch (body kept as bytes)
 */
export interface HttpRawResponse extends HttpResponseMeta {
  /** Final URL after redirects */
  url: string;
  body: Buffer;
  bodySkipped: boolean;
}

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
  headers?: Headers;
}

/**
 * HTTP request function types for dependency injection
 */
export type HttpRequestFn = <T>(req: HttpRequest) => Promise<T>;
export type HttpFetchFn = (req: HttpRequest) => Promise<HttpRawResponse>;
