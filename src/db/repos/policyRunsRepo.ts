/**
 * Policy runs repository
 *
 * Data access layer for policy_runs table.
 */

import type { PolicyResolution, PolicyRunRow } from "@/types";
import { getDb } from "../connection";

/**
 * Record one company resolution
 * Returns the row id
 */
export function insertPolicyRun(resolution: PolicyResolution): number {
  const db = getDb();

  const result = db
    .prepare(
      `
    INSERT INTO policy_runs (
      company_name, base_url, status, source, policy_url,
      security_txt_url, confidence, record_json, error
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
  `,
    )
    .run(
      resolution.company.name,
      resolution.company.baseUrl,
      resolution.status,
      resolution.source ?? null,
      resolution.policyUrl ?? null,
      resolution.securityTxtUrl ?? null,
      resolution.confidence ?? null,
      resolution.record ? JSON.stringify(resolution.record) : null,
      resolution.error ?? null,
    );

  return Number(result.lastInsertRowid);
}

/**
 * List recorded runs, oldest first, optionally for one company
 */
export function listPolicyRuns(companyName?: string): PolicyRunRow[] {
  const db = getDb();

  if (companyName !== undefined) {
    return db
      .prepare("SELECT * FROM policy_runs WHERE company_name = ? ORDER BY id")
      .all(companyName) as PolicyRunRow[];
  }
  return db.prepare("SELECT * FROM policy_runs ORDER BY id").all() as PolicyRunRow[];
}
