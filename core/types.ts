export type Classification =
  | "header"
  | "listItem"
  | "financial"
  | "paragraph"
  | "unclassified"

export interface Line {
  text: string
  cells: readonly string[] // split on 2+ whitespace, tab or "|"
}

export interface ClassifiedLine extends Line {
  classification: Classification
}

/** Rows of cells; at least 2 rows of at least 2 cells when produced by the detector. */
export type TableCandidate = ReadonlyArray<readonly string[]>

export interface PageStructure {
  readonly headers: readonly string[]
  readonly lists: readonly string[]
  readonly paragraphs: readonly string[]
  readonly financialData: readonly string[]
  readonly tables: readonly TableCandidate[]
  // Every non-empty line in page order, unclassified ones included
  readonly lines: readonly ClassifiedLine[]
}

export type TableSource = "native-a" | "native-b" | "ocr"

export type NativeTableSource = Exclude<TableSource, "ocr">

export interface NativeTableSet {
  source: NativeTableSource
  tables: readonly TableCandidate[]
}

export interface SourcedTable {
  readonly source: TableSource
  readonly page: number | null // 1-based, null for native tables
  readonly rows: TableCandidate
}

export interface DocumentModel {
  readonly tables: readonly SourcedTable[]
  readonly headers: readonly string[]
  readonly lists: readonly string[]
  readonly paragraphs: readonly string[]
  readonly financialData: readonly string[]
}

export interface DocumentSummary {
  totalTables: number
  tablesBySource: Record<TableSource, number>
  headers: number
  lists: number
  paragraphs: number
  financialData: number
}
