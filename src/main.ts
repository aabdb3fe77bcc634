/**
 * CLI entrypoint: resolves the disclosure policy of every company in a CSV
 *
 * Usage:
 *   npm start -- --input companies.csv --output results.json [--no-db]
 *
 * Environment: see .env.example (ANTHROPIC_API_KEY and the selected search
 * backend's credentials are required).
 */

import "dotenv/config";
import { parseArgs } from "util";
import type { Company, PolicyResolution } from "@/types";
import { loadRuntimeConfig } from "./config";
import { closeBrowser } from "./content";
import { closeDb, insertPolicyRun, openDb, applyPendingMigrations } from "./db";
import { readCompaniesCsv, writeResultsJson } from "./io";
import { buildResolverDeps, resolveCompanyPolicy, runPolicyBatch } from "./orchestration";
import { loadVocabulary } from "./vocabulary";
import * as logger from "./logger";

type CliOptions = {
  input: string;
  output: string;
  useDb: boolean;
};

function parseCliOptions(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      input: { type: "string", short: "i" },
      output: { type: "string", short: "o", default: "results.json" },
      "no-db": { type: "boolean", default: false },
    },
  });

  if (!values.input) {
    throw new Error("Missing required option --input <companies.csv>");
  }

  return {
    input: values.input,
    output: values.output ?? "results.json",
    useDb: !values["no-db"],
  };
}

async function main(): Promise<void> {
  const cli = parseCliOptions(process.argv.slice(2));
  const config = loadRuntimeConfig();
  logger.setLogLevel(config.logLevel);

  const vocabulary = loadVocabulary();
  const companies: Company[] = readCompaniesCsv(cli.input);
  logger.info("Companies loaded", { input: cli.input, count: companies.length });

  let persist: ((resolution: PolicyResolution) => void) | undefined;
  if (cli.useDb) {
    applyPendingMigrations(openDb(config.dbPath));
    persist = (resolution) => {
      insertPolicyRun(resolution);
    };
  }

  const deps = buildResolverDeps(config, vocabulary);

  try {
    const { results, counters } = await runPolicyBatch(companies, {
      resolve: (company) => resolveCompanyPolicy(company, deps),
      persist,
    });

    writeResultsJson(cli.output, results);
    logger.info("Results written", { output: cli.output, ...counters });

    if (counters.error > 0) {
      logger.warn("Some companies failed - exiting with code 1", { errors: counters.error });
      process.exitCode = 1;
    }
  } finally {
    await closeBrowser();
    if (cli.useDb) {
      closeDb();
    }
  }
}

main().catch((error: unknown) => {
  logger.error("Fatal error", {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
