/**
 * JSON shape returned by the upload endpoint when the client asks for
 * `format=json` instead of a workbook.
 */

import type { DocumentModel, DocumentSummary, TableSource } from "../../core/types"
import { summarizeDocument } from "../services/document-engine"

export interface DocumentResponseTable {
  tableIndex: number // 1-based, model order
  source: TableSource
  page: number | null
  rows: string[][]
}

export interface DocumentResponse {
  success: true
  fileName: string
  summary: DocumentSummary
  tables: DocumentResponseTable[]
  headers: string[]
  lists: string[]
  paragraphs: string[]
  financialData: string[]
}

export interface DocumentErrorResponse {
  success: false
  error: string
}

/**
 * Converts a (frozen) document model into a plain, JSON-serializable response.
 *
 * @param model - Consolidated document model
 * @param fileName - Name of the uploaded file, echoed back to the client
 */
export function toDocumentResponse(model: DocumentModel, fileName: string): DocumentResponse {
  return {
    success: true,
    fileName,
    summary: summarizeDocument(model),
    tables: model.tables.map((table, index) => ({
      tableIndex: index + 1,
      source: table.source,
      page: table.page,
      rows: table.rows.map((row) => [...row]),
    })),
    headers: [...model.headers],
    lists: [...model.lists],
    paragraphs: [...model.paragraphs],
    financialData: [...model.financialData],
  }
}

export function toErrorResponse(error: unknown): DocumentErrorResponse {
  return {
    success: false,
    error: error instanceof Error && error.message ? error.message : "Unknown error",
  }
}
