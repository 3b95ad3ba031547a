/**
 * SKU lookup from the command line.
 *
 *   npm run lookup -- master.xlsx VPL-RND-0375 313-OBL-0500-0750
 *   npm run lookup -- master.xlsx --search "1/2"
 *   npm run lookup -- master.xlsx --batch skus.csv --out results.xlsx
 *   npm run lookup -- master.xlsx --audit
 */

import { readFile, writeFile } from "node:fs/promises";
import { parseArgs } from "node:util";
import { loadSkuConfig } from "@/lib/env";
import {
  buildLookupResultsCsv,
  buildLookupResultsWorkbook,
} from "@/lib/lookup/export";
import { createSkuLookup } from "@/lib/lookup/lookup-index";
import { parseSkuListFile, parseSkuMasterFile } from "@/lib/lookup/xlsx-parse";
import { auditLookupEntries } from "@/lib/sku/codec";

const USAGE =
  "Usage: sku-lookup <master.xlsx> [sku ...] [--search term] [--batch file] [--out file] [--audit]";

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      search: { type: "string", short: "s", multiple: true },
      batch: { type: "string", short: "b" },
      out: { type: "string", short: "o" },
      audit: { type: "boolean", default: false },
    },
  });

  const [masterPath, ...skus] = positionals;
  if (!masterPath) {
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  const config = loadSkuConfig();
  const lookup = createSkuLookup(config);

  const master = parseSkuMasterFile(await readFile(masterPath), masterPath);
  for (const warning of master.warnings) {
    console.warn("[sku-lookup]", warning);
  }
  lookup.load(master.entries);

  for (const sku of skus) {
    console.log(`${sku}: ${lookup.describe(lookup.resolve(sku))}`);
  }

  for (const term of values.search ?? []) {
    const matches = lookup.search(term);
    if (matches.length === 0) {
      console.log(`No matching descriptions found for "${term}".`);
      continue;
    }
    console.log(`Found ${matches.length} matching descriptions for "${term}":`);
    for (const description of matches) {
      console.log(`  ${description}`);
    }
  }

  if (values.batch) {
    const list = parseSkuListFile(await readFile(values.batch), values.batch);
    for (const warning of list.warnings) {
      console.warn("[sku-lookup]", warning);
    }
    const results = lookup.batchResolve(list.skus.map((item) => item.sku));

    if (values.out?.toLowerCase().endsWith(".xlsx")) {
      const { data } = buildLookupResultsWorkbook({ results, notFoundText: config.notFoundText });
      await writeFile(values.out, new Uint8Array(data));
      console.log("[sku-lookup] Wrote batch results", { file: values.out, rows: results.length });
    } else if (values.out) {
      const { csv } = buildLookupResultsCsv({ results, notFoundText: config.notFoundText });
      await writeFile(values.out, csv, "utf8");
      console.log("[sku-lookup] Wrote batch results", { file: values.out, rows: results.length });
    } else {
      for (const result of results) {
        console.log(`${result.sku}: ${lookup.describe(result)}`);
      }
    }
  }

  if (values.audit) {
    const report = auditLookupEntries(master.entries, { maxDenominator: config.maxDenominator });
    console.log("[sku-lookup] Audit", {
      checked: report.checked,
      matched: report.matched,
      mismatches: report.mismatches.length,
      undecodable: report.undecodable.length,
    });
    for (const mismatch of report.mismatches) {
      console.log(`  ${mismatch.sku}: table "${mismatch.expected}" vs decoded "${mismatch.decoded}"`);
    }
  }
}

main().catch((error: unknown) => {
  console.error("[sku-lookup] Failed", error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
