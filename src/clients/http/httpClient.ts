/**
 * HTTP client wrapper: general-purpose client using native fetch
 * Supports timeouts, query params, retries with exponential backoff, and structured error handling
 *
 * Two entry points share the retry loop:
 * - httpRequest: JSON/text APIs (search backends)
 * - httpFetch: raw bytes plus response metadata (pages, PDFs, sitemaps, security.txt)
 */

import type {
  HttpRawResponse,
  HttpRequest,
  HttpResponseMeta,
} from "@/types/clients/http";
import { HttpError } from "./httpError";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_JSON_HEADERS,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_MAX_DELAY_MS,
  DEFAULT_MAX_RETRY_AFTER_MS,
  RETRYABLE_HTTP_METHODS,
  RETRYABLE_STATUS_CODES,
} from "@/constants/clients/http";
import * as logger from "@/logger";

/**
 * Build URL with query parameters (supports arrays for repeated params)
 */
function buildUrl(
  baseUrl: string,
  query?: Record<string, string | number | boolean | Array<string | number | boolean>>,
): string {
  if (!query || Object.keys(query).length === 0) {
    return baseUrl;
  }

  const url = new URL(baseUrl);
  Object.entries(query).forEach(([key, value]) => {
    if (Array.isArray(value)) {
      // Append each array element as a repeated query param
      value.forEach((item) => url.searchParams.append(key, String(item)));
    } else {
      url.searchParams.append(key, String(value));
    }
  });

  return url.toString();
}

/**
 * Extract a snippet of the error response body for debugging
 */
async function extractBodySnippet(response: Response): Promise<string | undefined> {
  try {
    const text = await response.text();
    if (!text) {
      return undefined;
    }
    return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
      ? text.substring(0, ERROR_BODY_SNIPPET_MAX_LENGTH) + "..."
      : text;
  } catch {
    return undefined;
  }
}

/**
 * Check if an HTTP method is safe to retry (idempotent)
 */
function isMethodRetryable(method: string): boolean {
  return (RETRYABLE_HTTP_METHODS as readonly string[]).includes(method);
}

/**
 * Check if an HTTP status code warrants a retry
 */
function isStatusRetryable(status: number): boolean {
  return RETRYABLE_STATUS_CODES.includes(status);
}

/**
 * Check if an error is retryable
 * Returns true for network errors, timeouts, and retryable HTTP status codes
 */
function isErrorRetryable(error: unknown, method: string): boolean {
  // Only retry idempotent methods
  if (!isMethodRetryable(method)) {
    return false;
  }

  // HttpError with retryable status
  if (error instanceof HttpError) {
    return isStatusRetryable(error.status);
  }

  // Network errors and timeouts are retryable
  // AbortError (timeout), TypeError (network), etc.
  if (error instanceof Error) {
    return error.name === "AbortError" || error.name === "TypeError";
  }

  return false;
}

/**
 * Parse Retry-After header value
 * Supports both delay-seconds (number) and HTTP-date formats
 * Returns delay in milliseconds, or null if invalid/missing
 */
function parseRetryAfter(retryAfterHeader: string | null): number | null {
  if (!retryAfterHeader) {
    return null;
  }

  // Try parsing as seconds (numeric)
  const seconds = parseInt(retryAfterHeader, 10);
  if (!isNaN(seconds) && seconds > 0) {
    return seconds * 1000;
  }

  // Try parsing as HTTP date
  const date = new Date(retryAfterHeader);
  if (!isNaN(date.getTime())) {
    const delayMs = date.getTime() - Date.now();
    return delayMs > 0 ? delayMs : null;
  }

  return null;
}

/**
 * Compute exponential backoff delay with jitter
 * Formula: min(maxDelay, baseDelay * 2^(attempt-1)) * (0.5 + random(0.5))
 */
function computeBackoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  const jitter = 0.5 + Math.random() * 0.5; // Random between 0.5 and 1.0
  return Math.floor(cappedDelay * jitter);
}

/**
 * Compute retry delay considering Retry-After header and exponential backoff
 */
function computeRetryDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  maxRetryAfterMs: number,
  retryAfterHeader: string | null,
): number {
  const retryAfterMs = parseRetryAfter(retryAfterHeader);
  if (retryAfterMs !== null) {
    // Respect Retry-After but clamp to max
    return Math.min(retryAfterMs, maxRetryAfterMs);
  }

  return computeBackoffDelay(attempt, baseDelayMs, maxDelayMs);
}

/**
 * Sleep for the specified number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Parse a Content-Length header, null when absent or not a non-negative integer
 */
function parseContentLength(header: string | null): number | null {
  if (!header) {
    return null;
  }
  const value = Number(header.trim());
  return Number.isInteger(value) && value >= 0 ? value : null;
}

/**
 * Issue the fetch call with timeout and turn non-2xx responses into HttpError
 *
 * The timeout stays armed until `consume` resolves, so body reads are bounded too.
 */
async function performFetch<R>(
  req: HttpRequest,
  url: string,
  timeoutMs: number,
  consume: (response: Response) => Promise<R>,
): Promise<R> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    // Build headers - defaults first, caller headers override
    const headers: Record<string, string> = {};
    if (req.json !== undefined) {
      Object.assign(headers, DEFAULT_JSON_HEADERS);
    }
    Object.assign(headers, req.headers);

    const options: RequestInit = {
      method: req.method,
      headers,
      signal: controller.signal,
      redirect: "follow",
    };

    if (req.json !== undefined) {
      options.body = JSON.stringify(req.json);
    }

    const response = await fetch(url, options);

    // Check for HTTP errors (non-2xx)
    if (!response.ok) {
      const bodySnippet = await extractBodySnippet(response);
      throw new HttpError({
        status: response.status,
        statusText: response.statusText,
        url,
        bodySnippet,
        headers: response.headers,
      });
    }

    return await consume(response);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Decode a JSON/text response the way API callers expect
 */
async function consumeApiResponse<T>(
  req: HttpRequest,
  url: string,
  response: Response,
): Promise<T> {
  // Handle 204 No Content
  if (response.status === 204) {
    return undefined as T;
  }

  const contentType = response.headers.get("content-type");
  const isJson =
    contentType !== null &&
    (contentType.includes("application/json") || contentType.includes("+json"));

  if (!isJson) {
    logger.debug("Non-JSON response received", {
      method: req.method,
      url,
      status: response.status,
      contentType: contentType || "none",
    });
    // Return text content as fallback, let caller handle it
    const text = await response.text();
    return text as unknown as T;
  }

  try {
    const data: unknown = await response.json();
    return data as T;
  } catch (parseError) {
    logger.warn("JSON parse failed", {
      method: req.method,
      url,
      status: response.status,
      error: parseError instanceof Error ? parseError.message : String(parseError),
    });
    // Return undefined for parse failures to avoid crashing the flow
    return undefined as T;
  }
}

/**
 * Read a response into bytes plus metadata, honoring req.skipBody
 */
async function consumeRawResponse(
  req: HttpRequest,
  response: Response,
): Promise<HttpRawResponse> {
  const meta: HttpResponseMeta = {
    status: response.status,
    contentType: response.headers.get("content-type"),
    contentLength: parseContentLength(response.headers.get("content-length")),
  };

  if (req.skipBody && req.skipBody(meta)) {
    await response.body?.cancel();
    return { ...meta, url: response.url || req.url, body: Buffer.alloc(0), bodySkipped: true };
  }

  const body = Buffer.from(await response.arrayBuffer());
  return { ...meta, url: response.url || req.url, body, bodySkipped: false };
}

/**
 * Run an attempt function with the configured retry policy
 *
 * Retries are only performed for idempotent methods (GET, HEAD) on:
 * - Network errors (no response received)
 * - Timeout errors
 * - HTTP 408 (Request Timeout)
 * - HTTP 429 (Too Many Requests) - respects Retry-After header
 * - HTTP 5xx (Server errors)
 */
async function withRetries<R>(req: HttpRequest, attemptFn: () => Promise<R>): Promise<R> {
  const maxAttempts = req.retry?.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const baseDelayMs = req.retry?.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const maxDelayMs = req.retry?.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
  const maxRetryAfterMs = req.retry?.maxRetryAfterMs ?? DEFAULT_MAX_RETRY_AFTER_MS;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await attemptFn();
    } catch (error) {
      lastError = error;

      if (attempt >= maxAttempts) {
        break;
      }

      if (!isErrorRetryable(error, req.method)) {
        throw error;
      }

      // Extract Retry-After header if available (429 or 503)
      let retryAfterHeader: string | null = null;
      if (error instanceof HttpError && error.headers) {
        if (error.status === 429 || error.status === 503) {
          retryAfterHeader = error.headers.get("retry-after");
        }
      }

      const delayMs = computeRetryDelay(
        attempt,
        baseDelayMs,
        maxDelayMs,
        maxRetryAfterMs,
        retryAfterHeader,
      );

      logger.debug("Retrying HTTP request", {
        method: req.method,
        url: req.url,
        attempt,
        maxAttempts,
        delayMs,
        reason:
          error instanceof HttpError
            ? `status ${error.status}`
            : error instanceof Error
              ? error.name
              : String(error),
      });

      await sleep(delayMs);
    }
  }

  // All retries exhausted, throw the last error
  throw lastError;
}

/**
 * Perform an HTTP request and decode the JSON (or text) body
 *
 * @template T - Expected response type
 * @param req - HTTP request configuration
 * @returns Parsed JSON response of type T (text when the server does not send JSON)
 * @throws {HttpError} On non-2xx status codes (after all retries exhausted)
 * @throws {Error} On network errors or timeouts (after all retries exhausted)
 */
export async function httpRequest<T>(req: HttpRequest): Promise<T> {
  const timeoutMs = req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const url = buildUrl(req.url, req.query);

  return withRetries(req, () =>
    performFetch(req, url, timeoutMs, (response) =>
      consumeApiResponse<T>(req, url, response),
    ),
  );
}

/**
 * Perform an HTTP request and return the raw body with response metadata
 *
 * @param req - HTTP request configuration (skipBody may veto the body download)
 * @throws {HttpError} On non-2xx status codes (after all retries exhausted)
 * @throws {Error} On network errors or timeouts (after all retries exhausted)
 */
export async function httpFetch(req: HttpRequest): Promise<HttpRawResponse> {
  const timeoutMs = req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const url = buildUrl(req.url, req.query);

  return withRetries(req, () =>
    performFetch(req, url, timeoutMs, (response) => consumeRawResponse(req, response)),
  );
}
