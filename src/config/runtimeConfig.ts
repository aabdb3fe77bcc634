/**
 * Runtime configuration
 *
 * Reads the environment once at startup and validates it. Problems are
 * reported together in a single ConfigurationError.
 */

import type { LogLevel, RuntimeConfig, SearchBackend, SearchQueryKind } from "@/types";
import {
  CANDIDATES,
  CONTENT,
  DEFAULT_CONFIDENCE_THRESHOLD,
  DEFAULT_SCORING_CONCURRENCY,
  DEFAULT_SEARCH_BACKENDS,
  LOG_LEVELS,
  SEARCH_BACKENDS,
  SEARCH_QUERY_KINDS,
} from "@/constants";
import { ANTHROPIC_DEFAULT_MODEL } from "@/constants/clients/anthropic";
import {
  BRAVE_DEFAULT_COUNTRY,
  BRAVE_DEFAULT_SEARCH_LANG,
} from "@/constants/clients/brave";
import { isLogLevel } from "@/logger";

/**
 * Error thrown when the environment does not describe a usable configuration
 */
export class ConfigurationError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigurationError";
    this.problems = problems;
  }
}

type Env = Record<string, string | undefined>;

const TRUE_VALUES = new Set(["true", "1", "yes", "on"]);
const FALSE_VALUES = new Set(["false", "0", "no", "off"]);

function read(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function includesValue<T extends string>(allowed: readonly T[], value: string): value is T {
  return (allowed as readonly string[]).includes(value);
}

function parseList<T extends string>(
  env: Env,
  name: string,
  allowed: readonly T[],
  fallback: readonly T[],
  problems: string[],
): T[] {
  const raw = read(env, name);
  if (!raw) return [...fallback];

  const values: T[] = [];
  for (const item of raw.split(",")) {
    const value = item.trim().toLowerCase();
    if (!value) continue;
    if (!includesValue(allowed, value)) {
      problems.push(`${name}: unknown value "${value}" (allowed: ${allowed.join(", ")})`);
      continue;
    }
    if (!values.includes(value)) values.push(value);
  }
  if (values.length === 0) {
    problems.push(`${name}: at least one value is required`);
  }
  return values;
}

type NumberRange = {
  min: number;
  /** Whether min itself is rejected */
  minExclusive?: boolean;
  max?: number;
  /** Whether max itself is rejected */
  maxExclusive?: boolean;
  integer?: boolean;
};

function describeRange(range: NumberRange): string {
  const lower = `${range.minExclusive ? ">" : ">="} ${range.min}`;
  if (range.max === undefined) return lower;
  return `between ${range.min} and ${range.max}${range.maxExclusive ? " (exclusive)" : ""}`;
}

function inRange(value: number, range: NumberRange): boolean {
  if (!Number.isFinite(value)) return false;
  if (range.integer && !Number.isInteger(value)) return false;
  if (range.minExclusive ? value <= range.min : value < range.min) return false;
  if (range.max !== undefined && (range.maxExclusive ? value >= range.max : value > range.max)) {
    return false;
  }
  return true;
}

function parseNumber(
  env: Env,
  name: string,
  fallback: number,
  problems: string[],
  range: NumberRange,
): number {
  const raw = read(env, name);
  if (raw === undefined) return fallback;

  const value = Number(raw);
  if (!inRange(value, range)) {
    problems.push(
      `${name}: expected ${range.integer ? "an integer" : "a number"} ${describeRange(range)}, got "${raw}"`,
    );
    return fallback;
  }
  return value;
}

function parseBoolean(env: Env, name: string, fallback: boolean, problems: string[]): boolean {
  const raw = read(env, name);
  if (raw === undefined) return fallback;
  const value = raw.toLowerCase();
  if (TRUE_VALUES.has(value)) return true;
  if (FALSE_VALUES.has(value)) return false;
  problems.push(`${name}: expected a boolean, got "${raw}"`);
  return fallback;
}

function parseLogLevel(env: Env, problems: string[]): LogLevel {
  const raw = read(env, "LOG_LEVEL")?.toLowerCase();
  if (raw === undefined) return "info";
  if (isLogLevel(raw)) return raw;
  problems.push(`LOG_LEVEL: expected one of ${Object.keys(LOG_LEVELS).join(", ")}, got "${raw}"`);
  return "info";
}

/**
 * Build the runtime configuration from environment variables
 *
 * @throws {ConfigurationError} When a required value is missing or a value is invalid
 */
export function loadRuntimeConfig(env: Env = process.env): RuntimeConfig {
  const problems: string[] = [];

  const anthropicApiKey = read(env, "ANTHROPIC_API_KEY");
  if (!anthropicApiKey) {
    problems.push("ANTHROPIC_API_KEY is required");
  }

  const searchBackends: SearchBackend[] = parseList(
    env,
    "SEARCH_BACKENDS",
    SEARCH_BACKENDS,
    DEFAULT_SEARCH_BACKENDS,
    problems,
  );
  const searchQueryClasses: SearchQueryKind[] = parseList(
    env,
    "SEARCH_QUERY_CLASSES",
    SEARCH_QUERY_KINDS,
    SEARCH_QUERY_KINDS,
    problems,
  );

  const config: RuntimeConfig = {
    logLevel: parseLogLevel(env, problems),
    dbPath: read(env, "DB_PATH"),
    anthropic: {
      apiKey: anthropicApiKey ?? "",
      model: read(env, "ANTHROPIC_MODEL") ?? ANTHROPIC_DEFAULT_MODEL,
    },
    searchBackends,
    searchQueryClasses,
    resolution: {
      confidenceThreshold: parseNumber(
        env,
        "CONFIDENCE_THRESHOLD",
        DEFAULT_CONFIDENCE_THRESHOLD,
        problems,
        { min: 0, max: 1, maxExclusive: true },
      ),
      maxCandidates: parseNumber(env, "MAX_CANDIDATES", CANDIDATES.DEFAULT_MAX_CANDIDATES, problems, {
        min: 1,
        integer: true,
      }),
      scoringConcurrency: parseNumber(
        env,
        "SCORING_CONCURRENCY",
        DEFAULT_SCORING_CONCURRENCY,
        problems,
        { min: 1, integer: true },
      ),
    },
    pdfSizeLimitMb: parseNumber(env, "PDF_SIZE_LIMIT_MB", CONTENT.DEFAULT_PDF_SIZE_LIMIT_MB, problems, {
      min: 0,
      minExclusive: true,
    }),
    dynamicRender: parseBoolean(env, "DYNAMIC_RENDER", true, problems),
    enableSitemap: parseBoolean(env, "ENABLE_SITEMAP", true, problems),
  };

  if (searchBackends.includes("brave")) {
    const apiKey = read(env, "BRAVE_API_KEY");
    if (!apiKey) {
      problems.push("BRAVE_API_KEY is required when SEARCH_BACKENDS includes brave");
    } else {
      config.brave = {
        apiKey,
        country: read(env, "BRAVE_COUNTRY") ?? BRAVE_DEFAULT_COUNTRY,
        searchLang: read(env, "BRAVE_SEARCH_LANG") ?? BRAVE_DEFAULT_SEARCH_LANG,
      };
    }
  }

  if (searchBackends.includes("google")) {
    const apiKey = read(env, "GOOGLE_API_KEY");
    const cseId = read(env, "GOOGLE_CSE_ID");
    if (!apiKey || !cseId) {
      problems.push("GOOGLE_API_KEY and GOOGLE_CSE_ID are required when SEARCH_BACKENDS includes google");
    } else {
      config.google = { apiKey, cseId };
    }
  }

  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }

  return config;
}
