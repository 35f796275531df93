import { describe, it, expect } from "vitest";
import * as XLSX from "xlsx";
import { consolidate } from "../06_consolidate";
import { structurePage } from "../05_structurePage";
import { exportDocumentToExcel } from "../07_exportExcel";

const fixedClock = () => new Date(2024, 0, 15, 9, 5, 3);

function readBack(buffer: Buffer): XLSX.WorkBook {
  return XLSX.read(buffer, { type: "buffer" });
}

function cell(sheet: XLSX.WorkSheet, address: string): unknown {
  return sheet[address]?.v;
}

describe("exportDocumentToExcel", () => {
  const model = consolidate(
    [],
    [
      structurePage(
        [
          "QUARTERLY REPORT",
          "Month    Revenue",
          "January  125000",
          "• Customer satisfaction rate: 94.2%",
        ].join("\n")
      ),
      structurePage("Invoice paid on 04/12/2024"),
    ]
  );

  it("writes a Data sheet and a Summary sheet", () => {
    const workbook = readBack(exportDocumentToExcel(model, { now: fixedClock }));
    expect(workbook.SheetNames).toEqual(["Data", "Summary"]);
  });

  it("writes table rows first, then the single-column buckets", () => {
    const data = readBack(exportDocumentToExcel(model, { now: fixedClock })).Sheets.Data;

    expect(cell(data, "A1")).toBe("Month");
    expect(cell(data, "B1")).toBe("Revenue");
    expect(cell(data, "A2")).toBe("January");
    expect(cell(data, "B2")).toBe("125000");
    expect(cell(data, "A3")).toBe("QUARTERLY REPORT");
    expect(cell(data, "A4")).toBe("Invoice paid on 04/12/2024");
    expect(cell(data, "A5")).toBe("• Customer satisfaction rate: 94.2%");
    expect(cell(data, "A6")).toBeUndefined();
  });

  it("writes the counts and the conversion date to the Summary sheet", () => {
    const summary = readBack(exportDocumentToExcel(model, { now: fixedClock })).Sheets.Summary;

    expect(cell(summary, "A1")).toBe("PDF to Excel Data Conversion Summary");
    expect(cell(summary, "A3")).toBe("Content Type");
    expect(cell(summary, "B3")).toBe("Count");
    expect(cell(summary, "A4")).toBe("Total Tables");
    expect(cell(summary, "B4")).toBe(1);
    expect(cell(summary, "B5")).toBe(1);
    expect(cell(summary, "B6")).toBe(1);
    expect(cell(summary, "B7")).toBe(1);
    expect(cell(summary, "A8")).toBe("Paragraphs");
    expect(cell(summary, "B8")).toBe(0);
    expect(cell(summary, "A10")).toBe("Conversion Date");
    expect(cell(summary, "B10")).toBe("2024-01-15 09:05:03");
  });

  it("still writes both sheets for an empty model", () => {
    const workbook = readBack(exportDocumentToExcel(consolidate([], []), { now: fixedClock }));

    expect(workbook.SheetNames).toEqual(["Data", "Summary"]);
    expect(cell(workbook.Sheets.Data, "A1")).toBeUndefined();
    expect(cell(workbook.Sheets.Summary, "B4")).toBe(0);
  });
});
