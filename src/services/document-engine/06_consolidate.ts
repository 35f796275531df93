// document-engine/06_consolidate.ts
// ---------------------------------------------------------------------------
// Stage 6: Consolidate native table sets and per-page structures into one
// DocumentModel.
//
// Responsibility:
// - Native table sets first, in the order the caller supplies them, tagged
//   with their source
// - Then each page in order: its tables tagged "ocr" (with the 1-based page
//   index), and its buckets appended element-wise
// - Drop tables whose cells are all blank; nothing else is filtered, sorted or
//   deduplicated
//
// Caller contract (not checked here):
// - perPageStructures is already in final page order
// - native sources are expected before OCR-derived tables
//
// The same physical table captured natively and by OCR shows up twice; there
// is no reconciliation between sources.

import type {
  DocumentModel,
  DocumentSummary,
  NativeTableSet,
  PageStructure,
  SourcedTable,
  TableCandidate,
  TableSource,
} from "../../../core/types";

export function isBlankTable(rows: TableCandidate): boolean {
  return rows.every((row) => row.every((cell) => cell.trim().length === 0));
}

export function consolidate(
  nativeTableSets: readonly NativeTableSet[],
  perPageStructures: readonly PageStructure[]
): DocumentModel {
  const tables: SourcedTable[] = [];
  const headers: string[] = [];
  const lists: string[] = [];
  const paragraphs: string[] = [];
  const financialData: string[] = [];

  // Rows are copied; the model never aliases a caller's arrays.
  const pushTable = (source: TableSource, page: number | null, rows: TableCandidate): void => {
    if (isBlankTable(rows)) return;
    tables.push(
      Object.freeze({
        source,
        page,
        rows: Object.freeze(rows.map((row) => Object.freeze([...row]))),
      })
    );
  };

  for (const set of nativeTableSets) {
    for (const rows of set.tables) {
      pushTable(set.source, null, rows);
    }
  }

  perPageStructures.forEach((page, index) => {
    for (const rows of page.tables) {
      pushTable("ocr", index + 1, rows);
    }
    headers.push(...page.headers);
    lists.push(...page.lists);
    paragraphs.push(...page.paragraphs);
    financialData.push(...page.financialData);
  });

  return Object.freeze({
    tables: Object.freeze(tables),
    headers: Object.freeze(headers),
    lists: Object.freeze(lists),
    paragraphs: Object.freeze(paragraphs),
    financialData: Object.freeze(financialData),
  });
}

export function tablesBySource(model: DocumentModel, source: TableSource): TableCandidate[] {
  return model.tables.filter((table) => table.source === source).map((table) => table.rows);
}

export function summarizeDocument(model: DocumentModel): DocumentSummary {
  const tablesBySourceCount: Record<TableSource, number> = {
    "native-a": 0,
    "native-b": 0,
    ocr: 0,
  };
  for (const table of model.tables) {
    tablesBySourceCount[table.source] += 1;
  }

  return {
    totalTables: model.tables.length,
    tablesBySource: tablesBySourceCount,
    headers: model.headers.length,
    lists: model.lists.length,
    paragraphs: model.paragraphs.length,
    financialData: model.financialData.length,
  };
}

export function isEmptyDocument(model: DocumentModel): boolean {
  return (
    model.tables.length === 0 &&
    model.headers.length === 0 &&
    model.lists.length === 0 &&
    model.paragraphs.length === 0 &&
    model.financialData.length === 0
  );
}
