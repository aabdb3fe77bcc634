/**
 * HTTP client public API
 */

export { httpRequest, httpFetch, sleep } from "./httpClient";
export { HttpError, isHttpStatus } from "./httpError";
export type {
  HttpRequest,
  HttpMethod,
  HttpErrorDetails,
  HttpRetryConfig,
  HttpRawResponse,
  HttpResponseMeta,
  HttpRequestFn,
  HttpFetchFn,
} from "@/types";
