import { readFileSync } from "node:fs";

/**
 * Pull one code per line out of a text or CSV export.
 *
 * Blank lines and `#` comments are skipped; for CSV rows the first field
 * is the code.
 */
export function parseCodeLines(text: string): string[] {
  const codes: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const code = trimmed.split(",")[0].trim();
    if (code) codes.push(code);
  }
  return codes;
}

export function loadCodes(filePath: string): string[] {
  return parseCodeLines(readFileSync(filePath, "utf-8"));
}
