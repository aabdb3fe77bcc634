/**
 * Policy record and resolution type definitions
 */

import type { Company } from "./company";
import type { CandidateSource } from "./candidates";

/**
 * JSON value as returned by the extraction oracle
 */
export type PolicyFieldValue =
  | string
  | number
  | boolean
  | PolicyFieldValue[]
  | { [key: string]: PolicyFieldValue };

/**
 * JSON value before cleanup (the oracle may answer null or "")
 */
export type RawPolicyFieldValue =
  | string
  | number
  | boolean
  | null
  | RawPolicyFieldValue[]
  | { [key: string]: RawPolicyFieldValue };

export type RawPolicyFields = { [key: string]: RawPolicyFieldValue };

/**
 * Named attributes extracted from a policy page
 *
 * Unset or empty fields are omitted, never defaulted.
 */
export type PolicyFields = { [key: string]: PolicyFieldValue };

export type PolicyRecord = {
  companyName: string;
  policyUrl: string;
  fields: PolicyFields;
};

export type ResolutionStatus = "found" | "not_found" | "error";

/**
 * Outcome of one company resolution run
 */
export type PolicyResolution = {
  company: Company;
  status: ResolutionStatus;
  /** Source of the winning candidate */
  source?: CandidateSource;
  securityTxtUrl?: string;
  policyUrl?: string;
  /** Confidence of the winning candidate (absent on the security.txt fast path) */
  confidence?: number;
  /** Canonical URLs that were scored, in first-seen order */
  candidates: string[];
  record?: PolicyRecord;
  /** Set when status is "error" */
  error?: string;
};
