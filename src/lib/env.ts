import { skuConfigSchema } from "@/lib/validation";

export interface SkuConfig {
  maxDenominator: number;
  notFoundText: string;
}

const keys = ["SKU_MAX_DENOMINATOR", "SKU_NOT_FOUND_TEXT"] as const;

function readEnv(source: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = source[name]?.trim();
  return value ? value : undefined;
}

export function loadSkuConfig(source: NodeJS.ProcessEnv = process.env): SkuConfig {
  const parsed = skuConfigSchema.safeParse(
    Object.fromEntries(keys.map((name) => [name, readEnv(source, name)])),
  );
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")} (${issue.message})`)
      .join(", ");
    throw new Error(`Invalid environment variable: ${details}`);
  }

  return {
    maxDenominator: parsed.data.SKU_MAX_DENOMINATOR,
    notFoundText: parsed.data.SKU_NOT_FOUND_TEXT,
  };
}
