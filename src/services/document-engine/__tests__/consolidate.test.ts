import { describe, it, expect } from "vitest";
import type { NativeTableSet, PageStructure } from "../../../../core/types";
import {
  consolidate,
  isBlankTable,
  isEmptyDocument,
  summarizeDocument,
  tablesBySource,
} from "../06_consolidate";
import { structurePage } from "../05_structurePage";

function page(parts: Partial<PageStructure>): PageStructure {
  return {
    headers: [],
    lists: [],
    paragraphs: [],
    financialData: [],
    tables: [],
    lines: [],
    ...parts,
  };
}

describe("consolidate", () => {
  it("concatenates headers in page order", () => {
    const model = consolidate(
      [],
      [page({ headers: ["Executive Summary"] }), page({ headers: ["Conclusion"] })]
    );
    expect(model.headers).toEqual(["Executive Summary", "Conclusion"]);
  });

  it("keeps every bucket in page order without sorting or deduplicating", () => {
    const pages = [
      page({ lists: ["- b", "- a"], financialData: ["$5"], paragraphs: ["second page text"] }),
      page({ lists: ["- a"], financialData: ["1/1/24"], paragraphs: ["first page text"] }),
    ];
    const model = consolidate([], pages);

    expect(model.lists).toEqual(["- b", "- a", "- a"]);
    expect(model.financialData).toEqual(["$5", "1/1/24"]);
    expect(model.paragraphs).toEqual(["second page text", "first page text"]);
    expect(model.headers).toEqual(pages.flatMap((p) => p.headers));
  });

  it("places native tables before OCR tables and tags each with its source", () => {
    const native: NativeTableSet[] = [
      { source: "native-b", tables: [[["B1", "B2"], ["B3", "B4"]]] },
      { source: "native-a", tables: [[["A1", "A2"], ["A3", "A4"]]] },
    ];
    const pages = [
      structurePage("x  y\nz  w"),
      structurePage("no tables here"),
      structurePage("p  q\nr  s"),
    ];

    const model = consolidate(native, pages);

    expect(model.tables.map((t) => [t.source, t.page])).toEqual([
      ["native-b", null],
      ["native-a", null],
      ["ocr", 1],
      ["ocr", 3],
    ]);
    expect(tablesBySource(model, "ocr")).toEqual([
      [
        ["x", "y"],
        ["z", "w"],
      ],
      [
        ["p", "q"],
        ["r", "s"],
      ],
    ]);
    expect(tablesBySource(model, "native-a")).toEqual([[["A1", "A2"], ["A3", "A4"]]]);
  });

  it("drops tables whose cells are all blank, and only those", () => {
    const native: NativeTableSet[] = [
      {
        source: "native-a",
        tables: [
          [
            ["", " "],
            ["\t", ""],
          ],
          [],
          [
            ["", ""],
            ["", "42"],
          ],
        ],
      },
    ];

    const model = consolidate(native, [page({ tables: [[["  ", ""], ["", ""]]] })]);

    expect(model.tables).toHaveLength(1);
    expect(model.tables[0].rows).toEqual([
      ["", ""],
      ["", "42"],
    ]);
  });

  it("keeps the same table once per source", () => {
    const rows = [
      ["Month", "Revenue"],
      ["Jan", "100"],
    ];
    const model = consolidate([{ source: "native-a", tables: [rows] }], [page({ tables: [rows] })]);

    expect(model.tables.map((t) => t.source)).toEqual(["native-a", "ocr"]);
  });

  it("returns an empty model for no input", () => {
    const model = consolidate([], []);

    expect(model).toEqual({
      tables: [],
      headers: [],
      lists: [],
      paragraphs: [],
      financialData: [],
    });
    expect(isEmptyDocument(model)).toBe(true);
  });

  it("returns a frozen model", () => {
    const model = consolidate([], [page({ headers: ["A"] })]);

    expect(Object.isFrozen(model)).toBe(true);
    expect(Object.isFrozen(model.headers)).toBe(true);
    expect(Object.isFrozen(model.tables)).toBe(true);
  });

  it("copies native rows so later changes to the input do not reach the model", () => {
    const header = ["Region", "Sales"];
    const rows = [header, ["North", "10"]];

    const model = consolidate([{ source: "native-a", tables: [rows] }], []);
    header[1] = "CHANGED";
    rows.push(["", ""]);

    expect(model.tables[0].rows).toEqual([
      ["Region", "Sales"],
      ["North", "10"],
    ]);
    expect(Object.isFrozen(model.tables[0].rows)).toBe(true);
    expect(Object.isFrozen(model.tables[0].rows[0])).toBe(true);
  });
});

describe("isBlankTable", () => {
  it("treats a table with no rows as blank", () => {
    expect(isBlankTable([])).toBe(true);
  });

  it("treats any non-blank cell as content", () => {
    expect(isBlankTable([["", "x"]])).toBe(false);
  });
});

describe("summarizeDocument", () => {
  it("counts tables per source and bucket entries", () => {
    const model = consolidate(
      [{ source: "native-a", tables: [[["a", "b"], ["c", "d"]]] }],
      [
        page({
          headers: ["H1", "H2"],
          lists: ["- one"],
          tables: [[["e", "f"], ["g", "h"]]],
        }),
        page({ paragraphs: ["p"], financialData: ["$1", "$2", "$3"] }),
      ]
    );

    expect(summarizeDocument(model)).toEqual({
      totalTables: 2,
      tablesBySource: { "native-a": 1, "native-b": 0, ocr: 1 },
      headers: 2,
      lists: 1,
      paragraphs: 1,
      financialData: 3,
    });
    expect(isEmptyDocument(model)).toBe(false);
  });
});
