/**
 * SecurityTxtSource: authoritative discovery through security.txt
 *
 * Looks up /.well-known/security.txt, then the legacy /security.txt. The
 * first location that answers decides: a wrong media type ends the lookup
 * with nothing, a text/plain file is parsed for its Policy field.
 */

import type { DiscoverySource } from "@/interfaces";
import type {
  CandidateSource,
  DiscoveryQuery,
  HttpFetchFn,
  HttpRawResponse,
  SecurityTxtLookup,
} from "@/types";
import { httpFetch as defaultHttpFetch, HttpError } from "@/clients/http";
import { HTTP, SECURITY_TXT } from "@/constants";
import { normalizeSiteRoot } from "@/utils/identity/companyIdentity";
import { errorMessage, logFailure } from "@/utils/failures";
import { firstFieldValue, parseSecurityTxt } from "../securityTxtParser";
import * as logger from "@/logger";

export interface SecurityTxtSourceConfig {
  /**
   * Optional raw HTTP fetch function (for testing/mocking)
   * Defaults to production httpFetch implementation
   */
  httpFetch?: HttpFetchFn;
}

export class SecurityTxtSource implements DiscoverySource {
  readonly kind: CandidateSource = "authoritative";
  readonly id = "security.txt";

  private readonly httpFetch: HttpFetchFn;

  constructor(config?: SecurityTxtSourceConfig) {
    this.httpFetch = config?.httpFetch ?? defaultHttpFetch;
  }

  /**
   * Resolve the company's security.txt
   *
   * @returns The parsed file, or null when none is served as text/plain
   */
  async lookup(baseUrl: string): Promise<SecurityTxtLookup | null> {
    const siteRoot = normalizeSiteRoot(baseUrl);
    if (!siteRoot) {
      logger.warn("Unusable base URL for security.txt lookup", { baseUrl });
      return null;
    }

    for (const path of SECURITY_TXT.PATHS) {
      const url = new URL(path, siteRoot).toString();

      let response: HttpRawResponse;
      try {
        response = await this.httpFetch({
          method: "GET",
          url,
          headers: HTTP.HEADERS,
          timeoutMs: HTTP.TIMEOUT_MS,
          retry: { maxAttempts: HTTP.MAX_ATTEMPTS },
        });
      } catch (error) {
        if (error instanceof HttpError) {
          logger.debug("No security.txt at location", { url, status: error.status });
        } else {
          logFailure("source_unavailable", "security.txt request failed", {
            url,
            error: errorMessage(error),
          });
        }
        continue;
      }

      const mediaType = (response.contentType ?? "").split(";")[0].trim().toLowerCase();
      if (mediaType !== SECURITY_TXT.MEDIA_TYPE) {
        logger.warn("security.txt served with invalid media type, skipping", {
          url,
          contentType: response.contentType,
          reason: "invalid_media",
        });
        return null;
      }

      const fields = parseSecurityTxt(response.body.toString("utf-8"));
      const policyUrl = firstFieldValue(fields, "policy");

      logger.info(policyUrl ? "Policy found in security.txt" : "No policy in security.txt", {
        securityTxtUrl: response.url,
        policyUrl,
      });

      return { securityTxtUrl: response.url, policyUrl, fields };
    }

    logger.info("No security.txt present", { baseUrl });
    return null;
  }

  async discover(query: DiscoveryQuery): Promise<string[]> {
    const lookup = await this.lookup(query.company.baseUrl);
    return lookup?.policyUrl ? [lookup.policyUrl] : [];
  }
}
