/**
 * Batch run type definitions
 */

import type { PolicyResolution } from "./policy";

export type BatchCounters = {
  checked: number;
  found: number;
  notFound: number;
  error: number;
  persisted: number;
};

export type BatchResult = {
  results: PolicyResolution[];
  counters: BatchCounters;
};
