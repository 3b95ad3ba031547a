import { loadSkuConfig, type SkuConfig } from "@/lib/env";
import { decodeSku } from "@/lib/sku/codec";
import { LookupIndexError, SkuCodecError, isSkuCodecError } from "@/lib/sku/errors";
import { dimensionFromDecimal, dimensionsEqual, parseFraction } from "@/lib/sku/fraction";
import { parseDescription } from "@/lib/sku/render";
import type { CodecOptions, Dimension, LookupEntry, ParsedDescription } from "@/lib/types";
import { attributeQuerySchema, lookupEntrySchema, type AttributeQuery } from "@/lib/validation";

export interface LookupIndex {
  readonly table: ReadonlyMap<string, string>;
  /** One description per SKU, in the order each SKU first appeared. */
  readonly descriptions: readonly string[];
  readonly searchKeys: readonly string[];
  readonly attributes: readonly (ParsedDescription | null)[];
  readonly skippedRows: number;
  readonly duplicateSkus: number;
  readonly builtAt: Date;
}

export interface NotFoundReason {
  /** "unrecognized" when the prefix or shape code is unknown. */
  type: "unrecognized" | "undecodable";
  error: SkuCodecError;
}

export type ResolveResult =
  | { sku: string; status: "found"; description: string; source: "table" | "codec" }
  | { sku: string; status: "not_found"; reason: NotFoundReason };

export const DEFAULT_NOT_FOUND_TEXT = "SKU not found.";

export function buildLookupIndex(entries: Iterable<LookupEntry>): LookupIndex {
  const table = new Map<string, string>();
  let rows = 0;
  let skippedRows = 0;
  let duplicateSkus = 0;

  for (const entry of entries) {
    rows += 1;
    const parsed = lookupEntrySchema.safeParse(entry);
    if (!parsed.success) {
      skippedRows += 1;
      continue;
    }
    if (table.has(parsed.data.sku)) duplicateSkus += 1;
    table.set(parsed.data.sku, parsed.data.description);
  }

  if (rows === 0) {
    throw new LookupIndexError("EmptyDataset", "No SKU rows were supplied.");
  }
  if (table.size === 0) {
    throw new LookupIndexError(
      "EmptyDataset",
      `None of the ${rows} rows had both a SKU and a description.`,
    );
  }

  const descriptions = Object.freeze([...table.values()]);
  return Object.freeze({
    table,
    descriptions,
    searchKeys: Object.freeze(descriptions.map((description) => description.toLowerCase())),
    attributes: Object.freeze(descriptions.map((description) => parseDescription(description))),
    skippedRows,
    duplicateSkus,
    builtAt: new Date(),
  });
}

export function resolveSku(
  index: LookupIndex,
  sku: string,
  options: CodecOptions = {},
): ResolveResult {
  const key = sku.trim();
  const description = index.table.get(key);
  if (description !== undefined) {
    return { sku, status: "found", description, source: "table" };
  }

  try {
    return { sku, status: "found", description: decodeSku(key, options), source: "codec" };
  } catch (error) {
    if (!isSkuCodecError(error)) throw error;
    const type = error.code === "UnknownShapeCode" ? "unrecognized" : "undecodable";
    return { sku, status: "not_found", reason: { type, error } };
  }
}

export function batchResolveSkus(
  index: LookupIndex,
  skus: readonly string[],
  options: CodecOptions = {},
): ResolveResult[] {
  return skus.map((sku) => resolveSku(index, sku, options));
}

export function searchDescriptions(index: LookupIndex, term: string): string[] {
  if (!term.trim()) return [];
  const needle = term.toLowerCase();
  return index.descriptions.filter((_, i) => index.searchKeys[i].includes(needle));
}

function toDimension(value: number | string, options: CodecOptions): Dimension {
  return typeof value === "number"
    ? dimensionFromDecimal(value, options.maxDenominator)
    : parseFraction(value, options);
}

export function searchByAttributes(
  index: LookupIndex,
  query: AttributeQuery,
  options: CodecOptions = {},
): string[] {
  const parsed = attributeQuerySchema.parse(query);
  const width = parsed.width !== undefined ? toDimension(parsed.width, options) : null;
  const length = parsed.length !== undefined ? toDimension(parsed.length, options) : null;

  return index.descriptions.filter((_, i) => {
    const attrs = index.attributes[i];
    if (!attrs) return false;
    if (parsed.kind && attrs.kind !== parsed.kind) return false;
    if (parsed.shape && attrs.shape !== parsed.shape) return false;
    if (parsed.keyway && attrs.keyway !== parsed.keyway) return false;
    if (width && !dimensionsEqual(attrs.width, width)) return false;
    if (length && !(attrs.length && dimensionsEqual(attrs.length, length))) return false;
    return true;
  });
}

export function describeResolveResult(
  result: ResolveResult,
  notFoundText: string = DEFAULT_NOT_FOUND_TEXT,
): string {
  return result.status === "found" ? result.description : notFoundText;
}

type LookupState =
  | { status: "unloaded" }
  | { status: "loaded"; index: LookupIndex };

export interface SkuLookup {
  readonly status: LookupState["status"];
  load(entries: Iterable<LookupEntry>): LookupIndex;
  resolve(sku: string): ResolveResult;
  batchResolve(skus: readonly string[]): ResolveResult[];
  search(term: string): string[];
  searchByAttributes(query: AttributeQuery): string[];
  decode(sku: string): string;
  describe(result: ResolveResult): string;
}

/**
 * Holds the current index. `load` builds a complete index before swapping it
 * in, so readers see either the previous index or the new one.
 */
export function createSkuLookup(config: SkuConfig = loadSkuConfig()): SkuLookup {
  const options: CodecOptions = { maxDenominator: config.maxDenominator };
  let state: LookupState = { status: "unloaded" };

  function requireIndex(): LookupIndex {
    if (state.status !== "loaded") {
      throw new LookupIndexError("IndexNotReady", "Load a SKU table before querying it.");
    }
    return state.index;
  }

  return {
    get status() {
      return state.status;
    },

    load(entries) {
      const index = buildLookupIndex(entries);
      state = { status: "loaded", index };
      console.log("[sku-lookup] Loaded index", {
        skus: index.table.size,
        skippedRows: index.skippedRows,
        duplicateSkus: index.duplicateSkus,
      });
      return index;
    },

    resolve(sku) {
      const result = resolveSku(requireIndex(), sku, options);
      if (result.status === "not_found") {
        console.debug("[sku-lookup] Not found", {
          sku,
          reason: result.reason.type,
          code: result.reason.error.code,
        });
      }
      return result;
    },

    batchResolve(skus) {
      return batchResolveSkus(requireIndex(), skus, options);
    },

    search(term) {
      return searchDescriptions(requireIndex(), term);
    },

    searchByAttributes(query) {
      return searchByAttributes(requireIndex(), query, options);
    },

    decode(sku) {
      return decodeSku(sku, options);
    },

    describe(result) {
      return describeResolveResult(result, config.notFoundText);
    },
  };
}
