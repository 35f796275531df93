// document-engine/04_detectTables.ts
// ---------------------------------------------------------------------------
// Stage 4: Table pattern detection over one page of text.
//
// Responsibility:
// - Group contiguous "multi-column looking" lines into table candidates
// - A line is tabular when it splits into enough cells on runs of 2+ whitespace
//   characters or on a tab
// - Blank lines and non-tabular lines both close the current candidate
// - A candidate with too few rows is dropped without trace
//
// Limitations (kept on purpose, covered by tests):
// - No column alignment and no type inference
// - A table interrupted by one non-tabular line (e.g. a running header) comes
//   out as two candidates, or none when either half is a single row

import { DEFAULT_ENGINE_CONFIG } from "../../../core/config";
import type { EngineConfig } from "../../../core/config";
import type { TableCandidate } from "../../../core/types";

const TABLE_CELL_SEPARATOR = /\s{2,}|\t/;

export function splitTableCells(line: string): string[] {
  return line
    .trim()
    .split(TABLE_CELL_SEPARATOR)
    .map((cell) => cell.trim())
    .filter((cell) => cell.length > 0);
}

export function splitPageLines(pageText: string): string[] {
  if (!pageText) return [];
  return pageText.split(/\r\n|\r|\n/);
}

/**
 * Detects table candidates in a page of OCR text.
 *
 * Every returned candidate has at least `minTableRows` rows and every row has
 * at least `minTableColumns` cells.
 */
export function detectTables(
  pageText: string,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): TableCandidate[] {
  const tables: TableCandidate[] = [];
  let current: string[][] = [];

  const close = (): void => {
    if (current.length >= config.minTableRows) {
      tables.push(Object.freeze(current.map((row) => Object.freeze(row))));
    }
    current = [];
  };

  for (const rawLine of splitPageLines(pageText)) {
    const line = rawLine.trim();
    if (!line) {
      close();
      continue;
    }

    const cells = splitTableCells(line);
    if (cells.length >= config.minTableColumns) {
      current.push(cells);
    } else {
      close();
    }
  }

  close();
  return tables;
}
