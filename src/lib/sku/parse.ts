import type { CodecOptions, Dimension, ToolDescriptor } from "@/lib/types";
import {
  CANONICAL_PREFIX,
  DIMENSION_FIELD_WIDTH,
  DIMENSION_SCALE,
  KEYWAYS,
  SHAPES,
  keywayFromCode,
  kindFromPrefix,
  shapeFromCode,
} from "./code-tables";
import { SkuCodecError } from "./errors";
import { DEFAULT_MAX_DENOMINATOR, reduceDimension } from "./fraction";

const DIMENSION_FIELD_RE = new RegExp(`^\\d{${DIMENSION_FIELD_WIDTH}}$`);

export function normalizeSku(raw: string): string {
  return raw.trim().toUpperCase();
}

/**
 * Thousandths within half a thousandth of a 1/maxDenominator tick snap to
 * that tick (0375 -> 3/8, 1031 -> 1 1/32). Anything else keeps its exact
 * value, which the formatter then rejects.
 */
export function thousandthsToDimension(
  thousandths: number,
  maxDenominator: number = DEFAULT_MAX_DENOMINATOR,
): Dimension {
  const scaled = thousandths * maxDenominator;
  const ticks = Math.round(scaled / DIMENSION_SCALE);
  if (ticks > 0 && Math.abs(scaled - ticks * DIMENSION_SCALE) * 2 <= maxDenominator) {
    return reduceDimension(ticks, maxDenominator);
  }
  return reduceDimension(thousandths, DIMENSION_SCALE);
}

function parseDimensionField(field: string, sku: string, maxDenominator: number): Dimension {
  if (!DIMENSION_FIELD_RE.test(field)) {
    throw new SkuCodecError(
      "MalformedSku",
      `Dimension "${field}" must be ${DIMENSION_FIELD_WIDTH} digits in thousandths of an inch`,
      sku,
    );
  }
  const thousandths = Number.parseInt(field, 10);
  if (thousandths === 0) {
    throw new SkuCodecError("MalformedSku", "Dimension must be greater than zero", sku);
  }
  return thousandthsToDimension(thousandths, maxDenominator);
}

export function assertDescriptorArity(descriptor: ToolDescriptor): void {
  const expected = SHAPES[descriptor.shape].dimensions;
  const hasLength = descriptor.length !== undefined;
  if ((expected === 2) !== hasLength) {
    throw new SkuCodecError(
      "InvalidDescriptor",
      expected === 2
        ? `${SHAPES[descriptor.shape].name} requires a length`
        : `${SHAPES[descriptor.shape].name} takes a single dimension`,
      descriptor.rawSku,
    );
  }
}

export function parseSku(raw: string, options: CodecOptions = {}): ToolDescriptor {
  const maxDenominator = options.maxDenominator ?? DEFAULT_MAX_DENOMINATOR;
  const sku = normalizeSku(raw);
  if (!sku) {
    throw new SkuCodecError("MalformedSku", "SKU is empty", raw);
  }

  const [prefix, shapeCode, ...rest] = sku.split("-");

  // Prefix is checked before any structural rule.
  const kind = kindFromPrefix(prefix);
  if (!kind) {
    throw new SkuCodecError("UnknownShapeCode", `Unknown SKU prefix "${prefix}"`, raw);
  }
  if (!shapeCode) {
    throw new SkuCodecError("MalformedSku", "SKU has no shape code", raw);
  }
  const shape = shapeFromCode(shapeCode);
  if (!shape) {
    throw new SkuCodecError("UnknownShapeCode", `Unknown shape code "${shapeCode}"`, raw);
  }

  const dimensionFields = [...rest];
  let keywayToken: string | null = null;
  const last = dimensionFields[dimensionFields.length - 1];
  if (last !== undefined && !/^\d+$/.test(last)) {
    keywayToken = last;
    dimensionFields.pop();
  }

  const arity = SHAPES[shape].dimensions;
  if (dimensionFields.length !== arity) {
    throw new SkuCodecError(
      "MalformedSku",
      `${SHAPES[shape].name} expects ${arity} dimension field${arity === 1 ? "" : "s"}, found ${dimensionFields.length}`,
      raw,
    );
  }

  const keyway = keywayToken === null ? "none" : keywayFromCode(keywayToken);
  if (keyway === null) {
    throw new SkuCodecError("MalformedSku", `Unknown keyway code "${keywayToken}"`, raw);
  }
  if (kind === "die" && keywayToken !== null) {
    throw new SkuCodecError(
      "InvalidKeywayForDie",
      `Keyway code "${keywayToken}" is not allowed on a die`,
      raw,
    );
  }

  const width = parseDimensionField(dimensionFields[0], raw, maxDenominator);
  const length =
    arity === 2 ? parseDimensionField(dimensionFields[1], raw, maxDenominator) : undefined;
  const base = length ? { shape, width, length, rawSku: raw } : { shape, width, rawSku: raw };

  return kind === "punch" ? { ...base, kind, keyway } : { ...base, kind };
}

function dimensionToField(value: Dimension, sku: string): string {
  const thousandths = Math.round((value.numerator * DIMENSION_SCALE) / value.denominator);
  const field = String(thousandths).padStart(DIMENSION_FIELD_WIDTH, "0");
  if (thousandths <= 0 || field.length > DIMENSION_FIELD_WIDTH) {
    throw new SkuCodecError(
      "InvalidDescriptor",
      `${value.numerator}/${value.denominator} does not fit a ${DIMENSION_FIELD_WIDTH}-digit field`,
      sku,
    );
  }
  return field;
}

/** Writes the canonical SKU for a descriptor; the inverse of `parseSku`. */
export function buildSku(descriptor: ToolDescriptor): string {
  assertDescriptorArity(descriptor);
  const fields = [
    CANONICAL_PREFIX[descriptor.kind],
    SHAPES[descriptor.shape].code,
    dimensionToField(descriptor.width, descriptor.rawSku),
  ];
  if (descriptor.length) {
    fields.push(dimensionToField(descriptor.length, descriptor.rawSku));
  }
  if (descriptor.kind === "punch" && descriptor.keyway !== "none") {
    fields.push(KEYWAYS[descriptor.keyway].code);
  }
  return fields.join("-");
}
