import { readFileSync } from "node:fs";

/** One symbol per line; blank lines and `#` comments are skipped, duplicates keep their first position. */
export function parseSymbols(text: string): string[] {
  const symbols = text
    .split(/\r?\n/)
    .map(s => s.replace(/#.*$/, "").trim().toUpperCase())
    .filter(Boolean);
  return [...new Set(symbols)];
}

export function symbolsFromFile(path: string): string[] {
  return parseSymbols(readFileSync(path, "utf8"));
}
