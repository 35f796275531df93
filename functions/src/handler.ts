import busboy from "busboy";
import type { IncomingHttpHeaders } from "node:http";
import type { Readable } from "node:stream";

import { DEFAULT_UPLOAD_LIMIT_BYTES } from "../../core/config";
import { buildDocumentModel, exportDocumentToExcel } from "../../src/services/document-engine";
import type { ProcessDocumentOptions } from "../../src/services/document-engine";
import { toDocumentResponse, toErrorResponse } from "../../src/utils/documentResponse";

const XLSX_CONTENT_TYPE = "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";
const TEXT_CONTENT_TYPE = "text/plain; charset=utf-8";
const JSON_CONTENT_TYPE = "application/json; charset=utf-8";

// The subset of an Express / Cloud Functions request the handler reads.
export interface UploadRequest extends Readable {
  method?: string;
  headers: IncomingHttpHeaders;
  /** Body already buffered by the platform (Cloud Functions sets this). */
  rawBody?: Buffer;
}

export interface UploadResponse {
  status(code: number): UploadResponse;
  set(field: string, value: string): UploadResponse;
  setHeader(name: string, value: string): unknown;
  send(body: string): unknown;
  end(chunk: Buffer): unknown;
}

export interface PdfToExcelHandlerOptions extends ProcessDocumentOptions {
  maxUploadBytes?: number;
}

interface UploadedFile {
  fileName: string;
  data: Buffer;
}

interface ParsedUpload {
  file: UploadedFile | null;
  fields: Record<string, string>;
}

function parseMultipart(
  req: UploadRequest,
  contentType: string,
  maxUploadBytes: number
): Promise<ParsedUpload> {
  return new Promise<ParsedUpload>((resolve, reject) => {
    const bb = busboy({
      headers: { ...req.headers, "content-type": contentType },
      limits: { files: 1, fileSize: maxUploadBytes },
    });

    const fields: Record<string, string> = {};
    let file: UploadedFile | null = null;

    bb.on("file", (fieldName, stream, info) => {
      if (fieldName !== "file") {
        stream.resume();
        return;
      }
      const chunks: Buffer[] = [];
      stream.on("data", (data: Buffer) => {
        chunks.push(data);
      });
      stream.on("limit", () => {
        reject(new Error("Uploaded file is too large"));
      });
      stream.on("end", () => {
        file = { fileName: info.filename, data: Buffer.concat(chunks) };
      });
    });

    bb.on("field", (fieldName, value) => {
      fields[fieldName] = value;
    });

    bb.on("error", (err) => {
      reject(err);
    });

    bb.on("close", () => {
      resolve({ file, fields });
    });

    if (req.rawBody) {
      bb.end(req.rawBody);
    } else {
      req.pipe(bb);
    }
  });
}

/** "../Q3 report.PDF" → "Q3_report" */
export function toOutputBaseName(fileName: string): string {
  const baseName = fileName.split(/[\\/]/).pop() ?? "";
  const withoutExtension = baseName.replace(/\.pdf$/i, "");
  const safe = withoutExtension.replace(/[^A-Za-z0-9._-]+/g, "_").replace(/^[._]+/, "");
  return safe || "document";
}

function sendText(res: UploadResponse, status: number, message: string): void {
  res.status(status).set("Content-Type", TEXT_CONTENT_TYPE).send(message);
}

/**
 * HTTPS handler: POST multipart/form-data
 *   - field "file"   : PDF file (required)
 *   - field "format" : "json" for a JSON document response, otherwise an .xlsx download
 *
 * Errors:
 * - 405: not a POST
 * - 400: not multipart / unreadable form / missing file / not a .pdf
 * - 500: the pipeline failed (message in the body)
 */
export function createProcessPdfToExcelHandler(options: PdfToExcelHandlerOptions) {
  const maxUploadBytes = options.maxUploadBytes ?? DEFAULT_UPLOAD_LIMIT_BYTES;

  return async (req: UploadRequest, res: UploadResponse): Promise<void> => {
    if (req.method !== "POST") {
      sendText(res, 405, "Method Not Allowed");
      return;
    }

    const contentType = req.headers["content-type"] ?? "";
    if (!contentType.toLowerCase().startsWith("multipart/form-data")) {
      sendText(res, 400, "Invalid content type. Expected multipart/form-data");
      return;
    }

    let upload: ParsedUpload;
    try {
      upload = await parseMultipart(req, contentType, maxUploadBytes);
    } catch (err) {
      console.error("[processPdfToExcel] Failed to parse multipart form:", err);
      sendText(res, 400, "Invalid multipart/form-data request");
      return;
    }

    const { file, fields } = upload;
    if (!file || file.data.length === 0) {
      sendText(res, 400, "Missing PDF file");
      return;
    }
    if (!/\.pdf$/i.test(file.fileName)) {
      sendText(res, 400, "Only PDF files are allowed");
      return;
    }

    const wantsJson = fields.format === "json";
    const baseName = toOutputBaseName(file.fileName);

    try {
      console.log(`[processPdfToExcel] Processing ${file.fileName} (${file.data.length} bytes)`);
      const model = await buildDocumentModel(file.data, options);

      if (wantsJson) {
        res
          .status(200)
          .set("Content-Type", JSON_CONTENT_TYPE)
          .send(JSON.stringify(toDocumentResponse(model, file.fileName)));
        return;
      }

      const excelBuffer = exportDocumentToExcel(model, options);
      console.log(`[processPdfToExcel] Excel generated: ${baseName}_converted.xlsx`);

      res.status(200);
      res.setHeader("Content-Type", XLSX_CONTENT_TYPE);
      res.setHeader("Content-Disposition", `attachment; filename="${baseName}_converted.xlsx"`);
      res.setHeader("Content-Length", excelBuffer.length.toString());
      res.end(excelBuffer);
    } catch (err) {
      console.error("[processPdfToExcel] Processing failed:", err);
      const response = toErrorResponse(err);
      if (wantsJson) {
        res.status(500).set("Content-Type", JSON_CONTENT_TYPE).send(JSON.stringify(response));
      } else {
        sendText(res, 500, `Processing failed: ${response.error}`);
      }
    }
  };
}
