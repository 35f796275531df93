// document-engine/index.ts
// ---------------------------------------------------------------------------
// Entry point for the document-engine module.
// Re-exports the public API of the numbered pipeline stages.

export * from "./01_extractText";
export * from "./02_extractNativeTables";
export * from "./03_classifyLine";
export * from "./04_detectTables";
export * from "./05_structurePage";
export * from "./06_consolidate";
export * from "./07_exportExcel";
export * from "./99_processDocument";
