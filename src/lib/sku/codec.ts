import type { CodecOptions, LookupEntry } from "@/lib/types";
import { SkuCodecError, isSkuCodecError } from "./errors";
import { parseSku } from "./parse";
import { renderDescription } from "./render";

export interface AuditMismatch {
  sku: string;
  expected: string;
  decoded: string;
}

export interface AuditUndecodable {
  sku: string;
  expected: string;
  error: SkuCodecError;
}

export interface AuditReport {
  checked: number;
  matched: number;
  mismatches: AuditMismatch[];
  undecodable: AuditUndecodable[];
}

export function decodeSku(sku: string, options: CodecOptions = {}): string {
  return renderDescription(parseSku(sku, options), options);
}

export function verifySku(
  sku: string,
  expectedDescription: string,
  options: CodecOptions = {},
): boolean {
  try {
    return decodeSku(sku, options) === expectedDescription;
  } catch (error) {
    if (isSkuCodecError(error)) return false;
    throw error;
  }
}

/**
 * Decodes every entry of an authoritative table and compares the result with
 * the stored description.
 */
export function auditLookupEntries(
  entries: readonly LookupEntry[],
  options: CodecOptions = {},
): AuditReport {
  const report: AuditReport = { checked: 0, matched: 0, mismatches: [], undecodable: [] };

  for (const entry of entries) {
    report.checked += 1;
    let decoded: string;
    try {
      decoded = decodeSku(entry.sku, options);
    } catch (error) {
      if (!isSkuCodecError(error)) throw error;
      report.undecodable.push({ sku: entry.sku, expected: entry.description, error });
      continue;
    }

    if (decoded === entry.description) {
      report.matched += 1;
    } else {
      report.mismatches.push({ sku: entry.sku, expected: entry.description, decoded });
    }
  }

  return report;
}
