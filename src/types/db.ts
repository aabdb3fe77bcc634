/**
 * Database row type definitions
 */

import type { ResolutionStatus } from "./policy";

/**
 * Row of the policy_runs table
 */
export type PolicyRunRow = {
  id: number;
  company_name: string;
  base_url: string;
  status: ResolutionStatus;
  source: string | null;
  policy_url: string | null;
  security_txt_url: string | null;
  confidence: number | null;
  record_json: string | null;
  error: string | null;
  created_at: string;
};
