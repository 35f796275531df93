// document-engine/99_processDocument.ts
// ---------------------------------------------------------------------------
// High-level pipeline orchestration for document-engine.
//
// Responsibility:
// - Take a PDF buffer and run every stage in order:
//   1) page texts            (PageTextSource, one text per page)
//   2) native tables          (NativeTableExtractor[], optional)
//   3) structurePage(text)    for each page, in page order
//   4) consolidate(native, pages)
//   5) exportDocumentToExcel(model)   (processDocument only)
//
// Rules:
// - The pipeline is linear; pages are never reordered
// - If a step throws, log it and rethrow
// - An empty document is returned as an empty model unless the caller asks
//   for it to be rejected

import { DEFAULT_ENGINE_CONFIG } from "../../../core/config";
import type { EngineConfig } from "../../../core/config";
import type { DocumentModel, NativeTableSet, PageStructure } from "../../../core/types";
import type { PageTextSource } from "./01_extractText";
import { extractNativeTables } from "./02_extractNativeTables";
import type { NativeTableExtractor } from "./02_extractNativeTables";
import { structurePage } from "./05_structurePage";
import { consolidate, isEmptyDocument, summarizeDocument } from "./06_consolidate";
import { exportDocumentToExcel } from "./07_exportExcel";
import type { ExportExcelOptions } from "./07_exportExcel";

export interface ProcessDocumentOptions extends ExportExcelOptions {
  pageTextSource: PageTextSource;
  nativeTableExtractors?: readonly NativeTableExtractor[];
  config?: EngineConfig;
  /** When false, a document with no tables and no bucket entries is an error. Default true. */
  allowEmptyDocument?: boolean;
}

async function runStep<T>(label: string, step: () => T | Promise<T>): Promise<T> {
  try {
    console.log(`[document-engine] ${label}`);
    return await step();
  } catch (err) {
    console.error(`[document-engine] ${label} failed`, err);
    throw err;
  }
}

/**
 * PDF buffer → DocumentModel.
 */
export async function buildDocumentModel(
  pdfBuffer: Uint8Array,
  options: ProcessDocumentOptions
): Promise<DocumentModel> {
  if (!pdfBuffer || pdfBuffer.byteLength === 0) {
    throw new Error("buildDocumentModel: pdfBuffer is empty");
  }
  const config = options.config ?? DEFAULT_ENGINE_CONFIG;

  const pageTexts = await runStep("Step 1: extract page text", () =>
    options.pageTextSource(pdfBuffer)
  );

  const nativeTableSets: NativeTableSet[] = await runStep(
    "Step 2: extract native tables",
    () => extractNativeTables(pdfBuffer, options.nativeTableExtractors ?? [])
  );

  const pages: PageStructure[] = await runStep("Step 3: structure pages", () =>
    pageTexts.map((text) => structurePage(text, config))
  );

  const model = await runStep("Step 4: consolidate", () =>
    consolidate(nativeTableSets, pages)
  );

  const summary = summarizeDocument(model);
  console.log("[document-engine] Extraction complete:", {
    pages: pages.length,
    ...summary,
  });

  if (options.allowEmptyDocument === false && isEmptyDocument(model)) {
    throw new Error("buildDocumentModel: no content could be extracted from the document");
  }

  return model;
}

/**
 * PDF buffer → Excel workbook bytes (.xlsx).
 */
export async function processDocument(
  pdfBuffer: Uint8Array,
  options: ProcessDocumentOptions
): Promise<Buffer> {
  const model = await buildDocumentModel(pdfBuffer, options);

  const excelBuffer = await runStep("Step 5: export to Excel", () =>
    exportDocumentToExcel(model, options)
  );

  console.log("[document-engine] Pipeline completed successfully. Excel size:", excelBuffer.length);
  return excelBuffer;
}
