/**
 * Degraded-step logging
 *
 * Every step that gives up on a candidate or a source logs exactly one
 * warning carrying its failure code, then returns an empty result.
 */

import type { FailureCode } from "@/types";
import * as logger from "@/logger";

export function logFailure(
  code: FailureCode,
  message: string,
  meta: Record<string, unknown> = {},
): void {
  logger.warn(message, { failure: code, ...meta });
}

/**
 * Error message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
