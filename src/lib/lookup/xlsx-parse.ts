import * as XLSX from "xlsx";
import type { LookupEntry } from "@/lib/types";

export interface ParsedMasterEntry extends LookupEntry {
  sheet: string;
  rowNum: number;
}

export interface ParsedMasterResult {
  entries: ParsedMasterEntry[];
  sheets: string[];
  warnings: string[];
}

export interface ParsedSkuListItem {
  sku: string;
  rowNum: number;
}

export interface ParsedSkuListResult {
  skus: ParsedSkuListItem[];
  warnings: string[];
}

const SKU_HEADERS = [
  "sku",
  "item",
  "item#",
  "item no",
  "item number",
  "part",
  "part#",
  "part number",
];
const DESCRIPTION_HEADERS = ["description", "desc", "name", "product", "product name"];

function cellText(value: unknown): string {
  return String(value ?? "").trim();
}

// Aliases are listed by priority, so an exact "SKU" column beats "Item".
function findColumn(headers: string[], aliases: string[], skip = -1): number {
  for (const alias of aliases) {
    const idx = headers.findIndex((h, i) => i !== skip && h === alias);
    if (idx >= 0) return idx;
  }
  return -1;
}

function detectColumns(headers: string[]): { sku: number; description: number | null } | null {
  const lower = headers.map((h) => h.trim().toLowerCase());
  const skuIdx = findColumn(lower, SKU_HEADERS);
  if (skuIdx === -1) return null;
  const descriptionIdx = findColumn(lower, DESCRIPTION_HEADERS, skuIdx);
  return { sku: skuIdx, description: descriptionIdx >= 0 ? descriptionIdx : null };
}

function findHeaderRow(
  rows: unknown[][],
  requireDescription: boolean,
): { index: number; sku: number; description: number | null } | null {
  for (let i = 0; i < Math.min(rows.length, 10); i++) {
    const detected = detectColumns(rows[i].map((c) => cellText(c)));
    if (detected && (!requireDescription || detected.description !== null)) {
      return { index: i, ...detected };
    }
  }
  return null;
}

function isBlankRow(row: unknown[] | undefined): boolean {
  return !row || row.every((c) => cellText(c) === "");
}

function readWorkbook(buffer: ArrayBuffer | Uint8Array, fileName: string): XLSX.WorkBook {
  // Plain-text sources keep cells as text so "0375" style codes keep their zeros.
  const isText = /\.(csv|txt)$/i.test(fileName);
  return XLSX.read(buffer, { type: "array", raw: isText });
}

function sheetRows(workbook: XLSX.WorkBook, sheetName: string): unknown[][] {
  const sheet = workbook.Sheets[sheetName];
  if (!sheet) return [];
  return XLSX.utils.sheet_to_json(sheet, { header: 1, defval: "" });
}

/**
 * Reads SKU/Description pairs from every sheet of a master workbook. Sheets
 * without both columns are skipped; rows missing either value are dropped.
 */
export function parseSkuMasterFile(
  buffer: ArrayBuffer | Uint8Array,
  fileName: string,
): ParsedMasterResult {
  const workbook = readWorkbook(buffer, fileName);
  if (workbook.SheetNames.length === 0) {
    return { entries: [], sheets: [], warnings: ["No sheets found in file"] };
  }

  const entries: ParsedMasterEntry[] = [];
  const sheets: string[] = [];
  const warnings: string[] = [];

  for (const sheetName of workbook.SheetNames) {
    const rows = sheetRows(workbook, sheetName);
    if (rows.length < 2) {
      warnings.push(`Sheet "${sheetName}" has no data rows, skipped`);
      continue;
    }

    const header = findHeaderRow(rows, true);
    if (!header || header.description === null) {
      warnings.push(`Sheet "${sheetName}" has no SKU and Description columns, skipped`);
      continue;
    }

    sheets.push(sheetName);
    for (let i = header.index + 1; i < rows.length; i++) {
      const row = rows[i];
      if (isBlankRow(row)) continue;

      const sku = cellText(row[header.sku]);
      const description = cellText(row[header.description]);
      if (!sku) {
        warnings.push(`Sheet "${sheetName}" row ${i + 1}: no SKU, skipped`);
        continue;
      }
      if (!description) {
        warnings.push(`Sheet "${sheetName}" row ${i + 1}: SKU "${sku}" has no description, skipped`);
        continue;
      }

      entries.push({ sku, description, sheet: sheetName, rowNum: i + 1 });
    }
  }

  if (entries.length === 0) {
    warnings.push(`No SKU rows found in "${fileName}".`);
  }

  return { entries, sheets, warnings };
}

/** Reads the SKU column of the first sheet of a batch lookup file. */
export function parseSkuListFile(
  buffer: ArrayBuffer | Uint8Array,
  fileName: string,
): ParsedSkuListResult {
  const workbook = readWorkbook(buffer, fileName);
  const sheetName = workbook.SheetNames[0];
  if (!sheetName) {
    return { skus: [], warnings: ["No sheets found in file"] };
  }

  const rows = sheetRows(workbook, sheetName);
  if (rows.length < 2) {
    return { skus: [], warnings: ["File appears empty or has no data rows"] };
  }

  const header = findHeaderRow(rows, false);
  if (!header) {
    return { skus: [], warnings: [`No SKU column found in "${fileName}".`] };
  }

  const skus: ParsedSkuListItem[] = [];
  for (let i = header.index + 1; i < rows.length; i++) {
    const row = rows[i];
    if (isBlankRow(row)) continue;
    const sku = cellText(row[header.sku]);
    if (!sku) continue;
    skus.push({ sku, rowNum: i + 1 });
  }

  return { skus, warnings: [] };
}
