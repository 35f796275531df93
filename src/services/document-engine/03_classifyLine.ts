// document-engine/03_classifyLine.ts
// ---------------------------------------------------------------------------
// Stage 3: Line classification.
//
// Responsibility:
// - Assign exactly one Classification to one trimmed, non-empty line of OCR text
// - Rules are evaluated in order and the first match wins, so a short upper-case
//   line is a header even when it carries a date, and a bulleted line is a list
//   item however long it is
// - Pure and deterministic: no logging, no state, never throws on a string

import { DEFAULT_ENGINE_CONFIG } from "../../../core/config";
import type { EngineConfig } from "../../../core/config";
import type { Classification, Line } from "../../../core/types";

const LIST_ITEM_PATTERN = /^[•\-*\d]+\.?\s/;

const CURRENCY_PATTERN = /\$\d{1,3}(?:,?\d{3})*(?:\.\d{2})?/;
const DATE_PATTERN = /\d{1,2}\/\d{1,2}\/\d{2,4}/;

const LINE_CELL_SEPARATOR = /\s{2,}|\t|\|/;

interface LineRule {
  label: Exclude<Classification, "unclassified">;
  matches: (line: string, config: EngineConfig) => boolean;
}

// Length in code points, so a bullet or an accented letter counts once.
function charLength(line: string): number {
  return Array.from(line).length;
}

/**
 * Upper case in the sense of "has at least one cased letter and no lower-case
 * letter": digits, spaces and punctuation are allowed around the letters.
 */
export function isUpperCaseLine(line: string): boolean {
  return /\p{Lu}/u.test(line) && !/\p{Ll}/u.test(line);
}

const LINE_RULES: readonly LineRule[] = [
  {
    label: "header",
    matches: (line, config) =>
      charLength(line) < config.headerMaxLength &&
      (isUpperCaseLine(line) ||
        config.headerPrefixes.some((prefix) => line.startsWith(prefix))),
  },
  {
    label: "listItem",
    matches: (line) => LIST_ITEM_PATTERN.test(line),
  },
  {
    label: "financial",
    matches: (line) => CURRENCY_PATTERN.test(line) || DATE_PATTERN.test(line),
  },
  {
    label: "paragraph",
    matches: (line, config) => charLength(line) > config.paragraphMinLength,
  },
];

/**
 * Classifies one line of page text.
 *
 * Expects a whitespace-trimmed, non-empty line; blank lines are dropped by the
 * caller before classification.
 */
export function classifyLine(
  line: string,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): Classification {
  for (const rule of LINE_RULES) {
    if (rule.matches(line, config)) {
      return rule.label;
    }
  }
  return "unclassified";
}

export function splitLineCells(text: string): string[] {
  return text
    .split(LINE_CELL_SEPARATOR)
    .map((cell) => cell.trim())
    .filter((cell) => cell.length > 0);
}

export function toLine(raw: string): Line {
  const text = raw.trim();
  return { text, cells: splitLineCells(text) };
}
