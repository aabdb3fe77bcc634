/**
 * ContentFetcher: retrieves a candidate URL and turns it into plain text
 *
 * A static GET decides the content type:
 * - PDF: size-gated, then text-extracted
 * - text/HTML: rendered (dynamic renderers first, static body as fallback)
 * - anything else: unsupported
 *
 * Every failure is logged with its failure code and yields null.
 */

import type { PageRenderer } from "@/interfaces";
import type {
  FetchedContent,
  HttpFetchFn,
  HttpRawResponse,
  HttpResponseMeta,
  RenderResult,
} from "@/types";
import { httpFetch as defaultHttpFetch } from "@/clients/http";
import {
  BYTES_PER_MB,
  CONTENT,
  HTTP,
  PDF_CONTENT_TYPE,
  TEXT_LIKE_CONTENT_TYPES,
} from "@/constants";
import { errorMessage, logFailure } from "@/utils/failures";
import { collapseWhitespace, htmlToText } from "./htmlText";
import { extractPdfText as defaultExtractPdfText } from "./pdfText";
import * as logger from "@/logger";

export interface ContentFetcherConfig {
  /** PDF size ceiling in megabytes (default 1) */
  pdfSizeLimitMb?: number;
  /**
   * Renderers tried in order before falling back to the static body
   * (empty list = static only)
   */
  renderers?: readonly PageRenderer[];
  /**
   * Optional raw HTTP fetch function (for testing/mocking)
   * Defaults to production httpFetch implementation
   */
  httpFetch?: HttpFetchFn;
  /** Optional PDF text extractor (for testing) */
  extractPdfText?: (data: Buffer) => Promise<string>;
}

function isPdf(contentType: string): boolean {
  return contentType.includes(PDF_CONTENT_TYPE);
}

function isTextLike(contentType: string): boolean {
  return TEXT_LIKE_CONTENT_TYPES.some((prefix) => contentType.startsWith(prefix));
}

export class ContentFetcher {
  private readonly pdfSizeLimitBytes: number;
  private readonly renderers: readonly PageRenderer[];
  private readonly httpFetch: HttpFetchFn;
  private readonly extractPdfText: (data: Buffer) => Promise<string>;

  constructor(config?: ContentFetcherConfig) {
    const limitMb = config?.pdfSizeLimitMb ?? CONTENT.DEFAULT_PDF_SIZE_LIMIT_MB;
    this.pdfSizeLimitBytes = limitMb * BYTES_PER_MB;
    this.renderers = config?.renderers ?? [];
    this.httpFetch = config?.httpFetch ?? defaultHttpFetch;
    this.extractPdfText = config?.extractPdfText ?? defaultExtractPdfText;
  }

  /**
   * Skip downloading PDFs whose declared size is already over the cap
   */
  private shouldSkipBody(meta: HttpResponseMeta): boolean {
    const contentType = (meta.contentType ?? "").toLowerCase();
    return (
      isPdf(contentType) &&
      meta.contentLength !== null &&
      meta.contentLength > this.pdfSizeLimitBytes
    );
  }

  async fetchContent(url: string): Promise<FetchedContent | null> {
    logger.debug("Fetching content", { url });

    let response: HttpRawResponse;
    try {
      response = await this.httpFetch({
        method: "GET",
        url,
        headers: HTTP.HEADERS,
        timeoutMs: HTTP.TIMEOUT_MS,
        retry: { maxAttempts: HTTP.MAX_ATTEMPTS },
        skipBody: (meta) => this.shouldSkipBody(meta),
      });
    } catch (error) {
      logFailure("source_unavailable", "Content request failed", {
        url,
        error: errorMessage(error),
      });
      return null;
    }

    const contentType = (response.contentType ?? "").toLowerCase();

    if (isPdf(contentType)) {
      return this.handlePdf(url, response);
    }

    if (isTextLike(contentType)) {
      return this.handleHtml(url, response.body.toString("utf-8"));
    }

    logFailure("unsupported_content", "Unsupported content type", {
      url,
      contentType: response.contentType,
    });
    return null;
  }

  private async handlePdf(url: string, response: HttpRawResponse): Promise<FetchedContent | null> {
    const sizeBytes = response.contentLength ?? response.body.length;
    if (response.bodySkipped || sizeBytes > this.pdfSizeLimitBytes) {
      logFailure("size_exceeded", "PDF exceeds size limit", {
        url,
        sizeBytes,
        limitBytes: this.pdfSizeLimitBytes,
      });
      return null;
    }

    let text: string;
    try {
      text = collapseWhitespace(await this.extractPdfText(response.body));
    } catch (error) {
      logFailure("extraction_failure", "PDF text extraction failed", {
        url,
        error: errorMessage(error),
      });
      return null;
    }

    if (!text) {
      logFailure("extraction_failure", "PDF contains no extractable text", { url });
      return null;
    }

    return { kind: "pdf", text };
  }

  /**
   * Produce the final markup: each renderer in turn, then the static body
   */
  async render(url: string, staticHtml: string): Promise<RenderResult> {
    for (const renderer of this.renderers) {
      try {
        const html = await renderer.render(url);
        if (html.trim()) {
          return { strategy: renderer.strategy, html };
        }
        logger.debug("Renderer returned empty markup", { url, strategy: renderer.strategy });
      } catch (error) {
        logger.debug("Renderer failed, falling back", {
          url,
          strategy: renderer.strategy,
          error: errorMessage(error),
        });
      }
    }
    return { strategy: "static", html: staticHtml };
  }

  private async handleHtml(url: string, staticHtml: string): Promise<FetchedContent | null> {
    const { strategy, html } = await this.render(url, staticHtml);
    const text = htmlToText(html);

    logger.debug("Page rendered", { url, strategy, chars: text.length });

    return { kind: "html", raw: html, text, renderStrategy: strategy };
  }
}
