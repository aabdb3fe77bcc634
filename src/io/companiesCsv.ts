/**
 * Company list input (CSV)
 *
 * Header row first; columns are found by name (company_name, base_url).
 * Fields may be double-quoted, with "" standing for a literal quote.
 */

import { readFileSync } from "fs";
import type { Company } from "@/types";
import * as logger from "@/logger";

const NAME_COLUMN = "company_name";
const URL_COLUMN = "base_url";

export class CompaniesCsvError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CompaniesCsvError";
  }
}

/**
 * Split CSV text into rows of fields
 *
 * Quoted fields may contain commas and line breaks.
 */
export function parseCsvRows(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
    } else if (ch === ",") {
      row.push(field);
      field = "";
    } else if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && text[i + 1] === "\n") i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = "";
    } else {
      field += ch;
    }
  }

  if (field !== "" || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  return rows.filter((r) => r.some((value) => value.trim() !== ""));
}

/**
 * Parse the company list
 *
 * Rows missing a name or base URL are skipped with a warning.
 *
 * @throws {CompaniesCsvError} When the header lacks a required column
 */
export function parseCompaniesCsv(text: string): Company[] {
  const [header, ...rows] = parseCsvRows(text.replace(/^\uFEFF/, ""));
  if (!header) {
    return [];
  }

  const columns = header.map((h) => h.trim().toLowerCase());
  const nameIndex = columns.indexOf(NAME_COLUMN);
  const urlIndex = columns.indexOf(URL_COLUMN);
  if (nameIndex === -1 || urlIndex === -1) {
    throw new CompaniesCsvError(
      `CSV header must contain "${NAME_COLUMN}" and "${URL_COLUMN}" (got: ${columns.join(", ")})`,
    );
  }

  const companies: Company[] = [];
  rows.forEach((row, index) => {
    const name = (row[nameIndex] ?? "").trim();
    const baseUrl = (row[urlIndex] ?? "").trim();
    if (!name || !baseUrl) {
      // +2: header row and 1-based numbering
      logger.warn("Skipping incomplete CSV row", { line: index + 2, name, baseUrl });
      return;
    }
    companies.push({ name, baseUrl });
  });

  return companies;
}

export function readCompaniesCsv(filePath: string): Company[] {
  return parseCompaniesCsv(readFileSync(filePath, "utf-8"));
}
