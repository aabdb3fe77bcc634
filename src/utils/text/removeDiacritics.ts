/**
 * Strips combining marks after NFD decomposition, so "Zürich" and "Zurich"
 * tokenize alike.
 *
 * @example
 * removeDiacritics("Société Générale") // "Societe Generale"
 */
const COMBINING_MARKS = /[\u0300-\u036f]/g;

export function removeDiacritics(text: string): string {
  return text.normalize("NFD").replace(COMBINING_MARKS, "");
}
