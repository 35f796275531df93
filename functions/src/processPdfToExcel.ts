import { onRequest } from "firebase-functions/v2/https";

import { loadEngineConfig, loadUploadLimitBytes } from "../../core/config";
import { textLayerPageTextSource } from "../../src/services/document-engine";
import { createProcessPdfToExcelHandler } from "./handler";

/**
 * Firebase HTTPS Function:
 *   POST /processPdfToExcel
 *
 * Request:
 * - multipart/form-data
 *   - field "file"  : PDF file
 *   - field "format": optional, "json" to get the structured document as JSON
 *
 * Pipeline (document-engine):
 * 1) page texts from the PDF text layer
 * 2) structurePage(text) for every page
 * 3) consolidate(...) into one DocumentModel
 * 4) exportDocumentToExcel(model)
 *
 * Response (success):
 * - 200, .xlsx download named "<upload name>_converted.xlsx"
 *
 * Response (error): see createProcessPdfToExcelHandler
 *
 * Engine thresholds and the upload limit come from DOC_ENGINE_* environment
 * variables, read once at cold start.
 */
const handler = createProcessPdfToExcelHandler({
  pageTextSource: textLayerPageTextSource,
  config: loadEngineConfig(),
  maxUploadBytes: loadUploadLimitBytes(),
});

export const processPdfToExcel = onRequest(
  {
    region: "us-central1",
    timeoutSeconds: 540,
    memory: "1GiB",
  },
  (req, res) => handler(req, res)
);
