/**
 * PolicyExtractor: structured extraction from the winning page
 */

import type { ExtractionOracle } from "@/interfaces";
import type { Company, FetchedContent, PolicyRecord } from "@/types";
import { errorMessage, logFailure } from "@/utils/failures";
import { cleanupExtractedFields } from "./cleanupFields";
import * as logger from "@/logger";

export interface PolicyExtractorDeps {
  oracle: ExtractionOracle;
}

/**
 * Record used when the oracle cannot extract anything
 */
export function minimalPolicyRecord(company: Company, policyUrl: string): PolicyRecord {
  return {
    companyName: company.name,
    policyUrl,
    fields: { program_name: company.name, policy_url: policyUrl },
  };
}

export class PolicyExtractor {
  private readonly oracle: ExtractionOracle;

  constructor(deps: PolicyExtractorDeps) {
    this.oracle = deps.oracle;
  }

  /**
   * Extract the policy record; an oracle failure yields the minimal record
   */
  async extract(
    company: Company,
    policyUrl: string,
    content: FetchedContent,
  ): Promise<PolicyRecord> {
    try {
      const raw = await this.oracle.extractPolicy({
        companyName: company.name,
        url: policyUrl,
        text: content.text,
      });
      const fields = cleanupExtractedFields(raw, policyUrl);
      logger.info("Policy extracted", {
        company: company.name,
        policyUrl,
        fields: Object.keys(fields).length,
      });
      return { companyName: company.name, policyUrl, fields };
    } catch (error) {
      logFailure("oracle_failure", "Policy extraction failed, using minimal record", {
        company: company.name,
        policyUrl,
        error: errorMessage(error),
      });
      return minimalPolicyRecord(company, policyUrl);
    }
  }
}
