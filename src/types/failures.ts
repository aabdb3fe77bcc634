/**
 * Failure taxonomy
 *
 * Every degraded step logs one of these codes. None of them aborts a run.
 */

import type { FAILURE_CODES } from "@/constants";

export type FailureCode = (typeof FAILURE_CODES)[number];
