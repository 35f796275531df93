// document-engine/05_structurePage.ts
// ---------------------------------------------------------------------------
// Stage 5: Structure one page of text.
//
// Responsibility:
// - Classify every non-empty line into the four buckets (headers, lists,
//   paragraphs, financial data); unclassified lines go nowhere
// - Run table detection over the same text independently: one line may land
//   in a bucket and in a table candidate at the same time
// - Empty text is an empty page, not an error

import { DEFAULT_ENGINE_CONFIG } from "../../../core/config";
import type { EngineConfig } from "../../../core/config";
import type { ClassifiedLine, PageStructure } from "../../../core/types";
import { classifyLine, toLine } from "./03_classifyLine";
import { detectTables, splitPageLines } from "./04_detectTables";

export function structurePage(
  pageText: string,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): PageStructure {
  const headers: string[] = [];
  const lists: string[] = [];
  const paragraphs: string[] = [];
  const financialData: string[] = [];
  const lines: ClassifiedLine[] = [];

  for (const rawLine of splitPageLines(pageText)) {
    const line = toLine(rawLine);
    if (!line.text) continue;

    const classification = classifyLine(line.text, config);
    lines.push(Object.freeze({ ...line, classification }));

    switch (classification) {
      case "header":
        headers.push(line.text);
        break;
      case "listItem":
        lists.push(line.text);
        break;
      case "financial":
        financialData.push(line.text);
        break;
      case "paragraph":
        paragraphs.push(line.text);
        break;
      case "unclassified":
        break;
    }
  }

  return Object.freeze({
    headers: Object.freeze(headers),
    lists: Object.freeze(lists),
    paragraphs: Object.freeze(paragraphs),
    financialData: Object.freeze(financialData),
    tables: Object.freeze(detectTables(pageText, config)),
    lines: Object.freeze(lines),
  });
}
