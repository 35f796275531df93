// document-engine/01_extractText.ts
// ---------------------------------------------------------------------------
// Stage 1: Page text extraction.
//
// Responsibility:
// - Turn a PDF buffer into one text blob per page, in page order
// - Two sources:
//   1) OCR: a PageRenderer rasterizes pages, an OcrEngine reads each image.
//      Both are collaborators supplied by the caller
//   2) Text layer: read directly with pdfjs-dist when the PDF has one
// - Normalize line breaks and invisible characters without touching runs of
//   spaces (table detection depends on them)
//
// Notes:
// - Pages are processed one at a time, in order
// - A page whose OCR fails becomes an empty page; it is logged, not thrown

import type { TextItem } from "pdfjs-dist/types/src/display/api";

/** Reads a PDF and returns one text per page, in page order. */
export type PageTextSource = (pdfBuffer: Uint8Array) => Promise<string[]>;

export interface PageImage {
  pageNumber: number; // 1-based
  width: number;
  height: number;
  data: Uint8Array; // encoded bitmap (PNG), format agreed between renderer and OCR engine
}

export interface PageRenderer {
  renderPages(pdfBuffer: Uint8Array): Promise<PageImage[]>;
}

export interface OcrEngine {
  recognize(image: PageImage): Promise<string>;
}

/**
 * Normalize raw page text for the structuring stages:
 * - \r\n / \r become \n
 * - zero-width characters are removed, non-breaking spaces become spaces
 * - trailing whitespace is stripped from every line
 */
export function normalizePageText(raw: string): string {
  if (!raw) return "";

  return raw
    .replace(/\r\n/g, "\n")
    .replace(/\r/g, "\n")
    .replace(/[\u200B-\u200D\uFEFF]/g, "")
    .replace(/\u00A0/g, " ")
    .split("\n")
    .map((line) => line.replace(/[ \t]+$/g, ""))
    .join("\n");
}

export function createOcrPageTextSource(
  renderer: PageRenderer,
  ocr: OcrEngine
): PageTextSource {
  return async (pdfBuffer) => {
    const images = await renderer.renderPages(pdfBuffer);
    const pages: string[] = [];

    for (const image of images) {
      console.log(`[extractText] Processing page ${image.pageNumber} with OCR...`);
      try {
        pages.push(normalizePageText(await ocr.recognize(image)));
      } catch (err) {
        console.warn(`[extractText] OCR failed on page ${image.pageNumber}:`, err);
        pages.push("");
      }
    }

    return pages;
  };
}

// Loaded on first use so that callers that only need the OCR path never pay
// for pdfjs. The legacy build carries the polyfills Node needs.
async function getPdfjsLib() {
  return import("pdfjs-dist/legacy/build/pdf.mjs");
}

function isTextItem(item: object): item is TextItem {
  return "str" in item;
}

// Horizontal gap, in average character widths, above which two items on the
// same line are treated as separate columns.
const COLUMN_GAP_CHARS = 2;

// Next item after `index` that carries text or ends a line; empty filler
// items between glyph runs are skipped.
function nextMeaningfulItem(items: readonly TextItem[], index: number): TextItem | undefined {
  for (let j = index + 1; j < items.length; j++) {
    if (items[j].str || items[j].hasEOL) return items[j];
  }
  return undefined;
}

/**
 * Joins a page's text items: a new line on hasEOL or when the baseline moves,
 * two spaces across a column gap, otherwise one space between items that sit
 * on the same line.
 *
 * pdfjs often ends a line with an empty `{ str: "", hasEOL: true }` item, so
 * the line break is taken from hasEOL before empty items are skipped.
 */
export function assemblePageText(items: readonly TextItem[]): string {
  let pageText = "";

  for (let i = 0; i < items.length; i++) {
    const item = items[i];
    if (item.hasEOL) {
      pageText += item.str;
      if (pageText && !pageText.endsWith("\n")) pageText += "\n";
      continue;
    }
    if (!item.str) continue;

    pageText += item.str;

    const next = nextMeaningfulItem(items, i);
    if (!next || !next.str) continue;

    const currentY = Number(item.transform[5] ?? 0);
    const nextY = Number(next.transform[5] ?? 0);
    if (Math.abs(currentY - nextY) >= 5) {
      pageText += "\n";
      continue;
    }

    const itemEnd = Number(item.transform[4] ?? 0) + item.width;
    const gap = Number(next.transform[4] ?? 0) - itemEnd;
    const charWidth = item.width / Math.max(1, item.str.length);
    if (charWidth > 0 && gap > charWidth * COLUMN_GAP_CHARS) {
      pageText += "  ";
    } else if (!item.str.endsWith(" ") && !next.str.startsWith(" ")) {
      pageText += " ";
    }
  }

  return normalizePageText(pageText);
}

export const textLayerPageTextSource: PageTextSource = async (pdfBuffer) => {
  const pdfjsLib = await getPdfjsLib();
  const loadingTask = pdfjsLib.getDocument({
    data: new Uint8Array(pdfBuffer),
    verbosity: 0,
    isEvalSupported: false,
  });
  const pdf = await loadingTask.promise.catch(async (err: unknown) => {
    await loadingTask.destroy();
    throw err;
  });

  const pages: string[] = [];
  try {
    for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
      const page = await pdf.getPage(pageNum);
      const textContent = await page.getTextContent();
      pages.push(assemblePageText(textContent.items.filter(isTextItem)));
    }
  } finally {
    await pdf.destroy();
  }

  console.log(`[extractText] Read text layer of ${pages.length} page(s)`);
  return pages;
};
