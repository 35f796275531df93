import type { DocumentModel, DocumentSummary } from "../core/types"

export type SheetRow = Array<string | number>

export const SUMMARY_TITLE = "PDF to Excel Data Conversion Summary"

function isBlankRow(row: readonly string[]): boolean {
  return row.every((cell) => cell.trim().length === 0)
}

/**
 * Builds the rows of the "Data" sheet from a document model.
 *
 * Layout:
 * - every table's rows, tables in model order, no header or separator between
 *   tables; rows whose cells are all blank are skipped
 * - then headers, financial data, lists and paragraphs, one entry per row in
 *   the first column
 *
 * @param model - Consolidated document model
 * @returns Array-of-arrays ready for XLSX.utils.aoa_to_sheet
 */
export function buildDataRows(model: DocumentModel): SheetRow[] {
  const rows: SheetRow[] = []

  for (const table of model.tables) {
    for (const row of table.rows) {
      if (isBlankRow(row)) continue
      rows.push([...row])
    }
  }

  const singleColumnBuckets = [model.headers, model.financialData, model.lists, model.paragraphs]
  for (const bucket of singleColumnBuckets) {
    for (const entry of bucket) {
      if (!entry.trim()) continue
      rows.push([entry])
    }
  }

  return rows
}

/** Formats a date as "YYYY-MM-DD HH:mm:ss" in local time. */
export function formatConversionDate(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0")
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  )
}

/**
 * Builds the rows of the "Summary" sheet: title on row 1, counts table from
 * row 3, conversion date two rows below the last count.
 */
export function buildSummaryRows(summary: DocumentSummary, convertedAt: Date): SheetRow[] {
  return [
    [SUMMARY_TITLE],
    [],
    ["Content Type", "Count"],
    ["Total Tables", summary.totalTables],
    ["Headers", summary.headers],
    ["Lists", summary.lists],
    ["Financial Data", summary.financialData],
    ["Paragraphs", summary.paragraphs],
    [],
    ["Conversion Date", formatConversionDate(convertedAt)],
  ]
}
