import { format } from "date-fns";
import * as XLSX from "xlsx";
import { DEFAULT_NOT_FOUND_TEXT, type ResolveResult } from "./lookup-index";

export const RESULTS_WORKBOOK_FILE_NAME = "sku_lookup_results.xlsx";

const HEADER = ["SKU", "Description", "Match"] as const;

export interface LookupResultRow {
  sku: string;
  description: string;
  match: "table" | "decoded" | "none";
}

export function toLookupResultRows(
  results: readonly ResolveResult[],
  notFoundText: string = DEFAULT_NOT_FOUND_TEXT,
): LookupResultRow[] {
  return results.map((result): LookupResultRow =>
    result.status === "found"
      ? {
          sku: result.sku,
          description: result.description,
          match: result.source === "table" ? "table" : "decoded",
        }
      : { sku: result.sku, description: notFoundText, match: "none" },
  );
}

function quote(value: string): string {
  return `"${value.replaceAll('"', '""')}"`;
}

export function buildLookupResultsCsv(input: {
  results: readonly ResolveResult[];
  notFoundText?: string;
  generatedAt?: Date;
}) {
  const date = input.generatedAt ?? new Date();
  const rows = toLookupResultRows(input.results, input.notFoundText).map((row) =>
    [row.sku, row.description, row.match].map(quote).join(","),
  );

  const csv = [HEADER.join(","), ...rows].join("\n");
  const fileName = `sku_lookup_results_${format(date, "yyyy-MM-dd")}.csv`;

  return { csv, fileName };
}

export function buildLookupResultsWorkbook(input: {
  results: readonly ResolveResult[];
  notFoundText?: string;
}) {
  const rows = toLookupResultRows(input.results, input.notFoundText).map((row) => [
    row.sku,
    row.description,
    row.match,
  ]);

  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([[...HEADER], ...rows]), "Results");
  const data: ArrayBuffer = XLSX.write(workbook, { type: "array", bookType: "xlsx" });

  return { data, fileName: RESULTS_WORKBOOK_FILE_NAME };
}
