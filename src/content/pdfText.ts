/**
 * PDF text extraction (pdf-parse)
 *
 * pdf-parse is loaded on first use: its entry point reads a bundled sample
 * file when it believes it runs as the main module.
 */

/**
 * Extract the text of every page of a PDF document
 *
 * Rejects when the document cannot be parsed.
 */
export async function extractPdfText(data: Buffer): Promise<string> {
  const { default: pdfParse } = await import("pdf-parse");
  const result = await pdfParse(data);
  return result.text;
}
