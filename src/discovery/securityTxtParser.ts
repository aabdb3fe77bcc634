/**
 * security.txt parsing (RFC 9116)
 *
 * Accepts plain files and PGP cleartext-signed files. Comments, blank lines
 * and malformed lines are ignored.
 */

import type { SecurityTxtField } from "@/types";

const FIELD_PATTERN = /^([A-Za-z][A-Za-z0-9-]*):\s*(.+)$/;
const PGP_MESSAGE_HEADER = "-----BEGIN PGP SIGNED MESSAGE-----";
const PGP_SIGNATURE_HEADER = "-----BEGIN PGP SIGNATURE-----";

/**
 * Parse security.txt content into fields, in file order
 *
 * Field names are lower-cased; values are trimmed.
 */
export function parseSecurityTxt(content: string): SecurityTxtField[] {
  const fields: SecurityTxtField[] = [];
  let inArmorHeader = false;

  for (const rawLine of content.split(/\r?\n/)) {
    let line = rawLine.trim();

    if (line === PGP_MESSAGE_HEADER) {
      inArmorHeader = true;
      continue;
    }
    if (inArmorHeader) {
      // Armor headers ("Hash: SHA256") end at the first blank line
      if (line === "") inArmorHeader = false;
      continue;
    }
    if (line === PGP_SIGNATURE_HEADER) {
      break;
    }

    // Dash-escaped lines in signed messages
    if (line.startsWith("- ")) {
      line = line.slice(2);
    }

    if (line === "" || line.startsWith("#")) {
      continue;
    }

    const match = FIELD_PATTERN.exec(line);
    if (!match) {
      continue;
    }
    fields.push({ name: match[1].toLowerCase(), value: match[2].trim() });
  }

  return fields;
}

/**
 * Value of the first field with the given name
 */
export function firstFieldValue(
  fields: readonly SecurityTxtField[],
  name: string,
): string | null {
  const wanted = name.toLowerCase();
  return fields.find((field) => field.name === wanted)?.value ?? null;
}
