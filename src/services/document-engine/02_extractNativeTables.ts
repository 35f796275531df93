// document-engine/02_extractNativeTables.ts
// ---------------------------------------------------------------------------
// Stage 2: Native table extraction.
//
// Tables recovered from the PDF's vector content by external extractors. The
// grid is already resolved; rows are taken as-is and only tagged with the
// extractor's source. An extractor that fails contributes an empty set.

import type { NativeTableSet, NativeTableSource, TableCandidate } from "../../../core/types";

export interface NativeTableExtractor {
  source: NativeTableSource;
  extract(pdfBuffer: Uint8Array): Promise<TableCandidate[]>;
}

export async function extractNativeTables(
  pdfBuffer: Uint8Array,
  extractors: readonly NativeTableExtractor[]
): Promise<NativeTableSet[]> {
  const sets: NativeTableSet[] = [];

  for (const extractor of extractors) {
    try {
      console.log(`[extractNativeTables] Extracting tables with ${extractor.source}...`);
      const tables = await extractor.extract(pdfBuffer);
      console.log(`[extractNativeTables] ${extractor.source} found ${tables.length} tables`);
      sets.push({ source: extractor.source, tables });
    } catch (err) {
      console.warn(`[extractNativeTables] ${extractor.source} extraction failed:`, err);
      sets.push({ source: extractor.source, tables: [] });
    }
  }

  return sets;
}
