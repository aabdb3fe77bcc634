/**
 * Post-processing of oracle-extracted policy fields
 */

import type {
  PolicyFieldValue,
  PolicyFields,
  RawPolicyFieldValue,
  RawPolicyFields,
} from "@/types";

const SELF_REFERENCE = "self";
const DROPPED_FIELDS: ReadonlySet<string> = new Set(["policy_url_status"]);

function isPresent(value: RawPolicyFieldValue): value is Exclude<RawPolicyFieldValue, null> {
  return value !== null && value !== "";
}

function cleanValue(value: Exclude<RawPolicyFieldValue, null>, policyUrl: string): PolicyFieldValue {
  if (Array.isArray(value)) {
    return value.filter(isPresent).map((item) => cleanValue(item, policyUrl));
  }
  if (typeof value === "object") {
    return cleanupExtractedFields(value, policyUrl);
  }
  if (value === SELF_REFERENCE) {
    return policyUrl;
  }
  return value;
}

/**
 * Clean an extracted field map, recursively
 *
 * - empty strings and nulls are dropped (in objects and lists)
 * - disclosure_timeline_days equal to 0 is dropped
 * - policy_url_status is always dropped
 * - the string "self" becomes the policy URL
 */
export function cleanupExtractedFields(data: RawPolicyFields, policyUrl: string): PolicyFields {
  const cleaned: PolicyFields = {};
  for (const [key, value] of Object.entries(data)) {
    if (!isPresent(value)) continue;
    if (DROPPED_FIELDS.has(key)) continue;
    if (key === "disclosure_timeline_days" && value === 0) continue;
    cleaned[key] = cleanValue(value, policyUrl);
  }
  return cleaned;
}
