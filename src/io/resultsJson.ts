/**
 * Batch output (JSON array of resolutions)
 */

import { mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import type { PolicyResolution } from "@/types";

export function formatResultsJson(results: readonly PolicyResolution[]): string {
  return JSON.stringify(results, null, 2) + "\n";
}

export function writeResultsJson(filePath: string, results: readonly PolicyResolution[]): void {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, formatResultsJson(results), "utf-8");
}
