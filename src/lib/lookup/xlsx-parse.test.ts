import * as XLSX from "xlsx";
import { describe, expect, it } from "vitest";
import { parseSkuListFile, parseSkuMasterFile } from "@/lib/lookup/xlsx-parse";

function workbookBuffer(sheets: Array<[string, unknown[][]]>): ArrayBuffer {
  const workbook = XLSX.utils.book_new();
  for (const [name, rows] of sheets) {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), name);
  }
  return XLSX.write(workbook, { type: "array", bookType: "xlsx" });
}

describe("parseSkuMasterFile", () => {
  it("reads SKU and Description columns from every sheet", () => {
    const buffer = workbookBuffer([
      [
        "Punches",
        [
          ["SKU", "Description"],
          ["VPL-RND-0375", "3/8 Round punch, no keyways"],
          ["VPL-HEX-0500", ""],
          ["VPL-SQR-0250", "1/4 Square punch, no keyways"],
        ],
      ],
      ["Notes", [["Comment"], ["Prices change in March"]]],
      [
        "Dies",
        [
          ["Die list"],
          ["sku", "DESCRIPTION"],
          [3130, "Legacy die"],
        ],
      ],
    ]);

    const result = parseSkuMasterFile(buffer, "master.xlsx");

    expect(result.entries).toEqual([
      {
        sku: "VPL-RND-0375",
        description: "3/8 Round punch, no keyways",
        sheet: "Punches",
        rowNum: 2,
      },
      {
        sku: "VPL-SQR-0250",
        description: "1/4 Square punch, no keyways",
        sheet: "Punches",
        rowNum: 4,
      },
      { sku: "3130", description: "Legacy die", sheet: "Dies", rowNum: 3 },
    ]);
    expect(result.sheets).toEqual(["Punches", "Dies"]);
    expect(result.warnings).toEqual([
      'Sheet "Punches" row 3: SKU "VPL-HEX-0500" has no description, skipped',
      'Sheet "Notes" has no SKU and Description columns, skipped',
    ]);
  });

  it("prefers exact SKU and Description headers over aliases", () => {
    const buffer = workbookBuffer([
      [
        "Catalog",
        [
          ["Item", "SKU", "Name", "Description"],
          [1, "VPL-RND-0375", "P1", "3/8 Round punch, no keyways"],
        ],
      ],
    ]);

    expect(parseSkuMasterFile(buffer, "master.xlsx").entries).toEqual([
      {
        sku: "VPL-RND-0375",
        description: "3/8 Round punch, no keyways",
        sheet: "Catalog",
        rowNum: 2,
      },
    ]);
  });

  it("keeps CSV cells as text", () => {
    const csv = "SKU,Description\nVPL-RND-0375,3/8 Round punch\n0375,Odd code\n";
    const result = parseSkuMasterFile(new TextEncoder().encode(csv), "master.csv");

    expect(result.entries.map((entry) => [entry.sku, entry.description])).toEqual([
      ["VPL-RND-0375", "3/8 Round punch"],
      ["0375", "Odd code"],
    ]);
  });

  it("warns when no sheet has usable rows", () => {
    const buffer = workbookBuffer([["Sheet1", [["Part Name", "Price"], ["Die", 4]]]]);
    const result = parseSkuMasterFile(buffer, "prices.xlsx");

    expect(result.entries).toEqual([]);
    expect(result.warnings).toEqual([
      'Sheet "Sheet1" has no SKU and Description columns, skipped',
      'No SKU rows found in "prices.xlsx".',
    ]);
  });
});

describe("parseSkuListFile", () => {
  it("reads the SKU column of the first sheet", () => {
    const buffer = workbookBuffer([
      [
        "Batch",
        [
          ["Qty", "Sku"],
          [2, "VPL-RND-0375"],
          [1, "  313-OBL-0500-0750 "],
          [5, ""],
        ],
      ],
    ]);

    expect(parseSkuListFile(buffer, "batch.xlsx")).toEqual({
      skus: [
        { sku: "VPL-RND-0375", rowNum: 2 },
        { sku: "313-OBL-0500-0750", rowNum: 3 },
      ],
      warnings: [],
    });
  });

  it("reports a missing SKU column", () => {
    const buffer = workbookBuffer([["Batch", [["Part Name"], ["Round punch"]]]]);

    expect(parseSkuListFile(buffer, "batch.xlsx")).toEqual({
      skus: [],
      warnings: ['No SKU column found in "batch.xlsx".'],
    });
  });
});
