// document-engine/07_exportExcel.ts
// ---------------------------------------------------------------------------
// Stage 7: Project a DocumentModel into an Excel workbook.
//
// Responsibility:
// - Sheet "Data": table rows, then the single-column buckets (layout lives in
//   excel/buildRows.ts)
// - Sheet "Summary": bucket and table counts plus the conversion date
// - No merged cells, no styling
//
// This module does not know about OCR, PDF or HTTP; it only writes the model
// it is given, unaltered and in order.

import * as XLSX from "xlsx";
import { buildDataRows, buildSummaryRows } from "../../../excel/buildRows";
import type { DocumentModel } from "../../../core/types";
import { summarizeDocument } from "./06_consolidate";

export const DATA_SHEET_NAME = "Data";
export const SUMMARY_SHEET_NAME = "Summary";

export interface ExportExcelOptions {
  /** Clock for the "Conversion Date" row. Defaults to the current time. */
  now?: () => Date;
}

export function buildWorkbook(
  model: DocumentModel,
  options: ExportExcelOptions = {}
): XLSX.WorkBook {
  const now = options.now ?? (() => new Date());

  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(
    workbook,
    XLSX.utils.aoa_to_sheet(buildDataRows(model)),
    DATA_SHEET_NAME
  );
  XLSX.utils.book_append_sheet(
    workbook,
    XLSX.utils.aoa_to_sheet(buildSummaryRows(summarizeDocument(model), now())),
    SUMMARY_SHEET_NAME
  );

  return workbook;
}

/**
 * Writes the document model as an .xlsx file and returns its bytes.
 *
 * An empty model still produces both sheets: an empty "Data" sheet and a
 * "Summary" sheet with zero counts.
 */
export function exportDocumentToExcel(
  model: DocumentModel,
  options: ExportExcelOptions = {}
): Buffer {
  const out: Buffer = XLSX.write(buildWorkbook(model, options), {
    bookType: "xlsx",
    type: "buffer",
  });
  return out;
}
