import type { KeywayType, ToolKind, ToolShape } from "@/lib/types";

/** Dimension fields are zero-padded thousandths of an inch. */
export const DIMENSION_FIELD_WIDTH = 4;
export const DIMENSION_SCALE = 1000;

export const PREFIX_KIND_MAP: Record<string, ToolKind> = {
  VPL: "punch",
  "313": "die",
};

export const CANONICAL_PREFIX: Record<ToolKind, string> = {
  punch: "VPL",
  die: "313",
};

export interface ShapeDefinition {
  code: string;
  name: string;
  dimensions: 1 | 2;
}

export const SHAPES: Record<ToolShape, ShapeDefinition> = {
  round: { code: "RND", name: "Round", dimensions: 1 },
  oblong: { code: "OBL", name: "Oblong", dimensions: 2 },
  rectangle: { code: "REC", name: "Rectangle", dimensions: 2 },
  hex: { code: "HEX", name: "Hex", dimensions: 1 },
  square: { code: "SQR", name: "Square", dimensions: 1 },
};

export interface KeywayDefinition {
  code: string;
  suffix: string;
}

export const KEYWAYS: Record<KeywayType, KeywayDefinition> = {
  none: { code: "NK", suffix: ", no keyways" },
  single: { code: "K1", suffix: ", single keyway" },
  double: { code: "K2", suffix: ", double keyway" },
};

export const TOOL_SHAPES: readonly ToolShape[] = ["round", "oblong", "rectangle", "hex", "square"];
export const KEYWAY_TYPES: readonly KeywayType[] = ["none", "single", "double"];

export function kindFromPrefix(prefix: string): ToolKind | null {
  return Object.hasOwn(PREFIX_KIND_MAP, prefix) ? PREFIX_KIND_MAP[prefix] : null;
}

export function shapeFromCode(code: string): ToolShape | null {
  return TOOL_SHAPES.find((shape) => SHAPES[shape].code === code) ?? null;
}

export function shapeFromName(name: string): ToolShape | null {
  const lower = name.toLowerCase();
  return TOOL_SHAPES.find((shape) => SHAPES[shape].name.toLowerCase() === lower) ?? null;
}

export function keywayFromCode(code: string): KeywayType | null {
  return KEYWAY_TYPES.find((keyway) => KEYWAYS[keyway].code === code) ?? null;
}

export function keywayFromSuffix(suffix: string): KeywayType | null {
  const lower = suffix.toLowerCase();
  return KEYWAY_TYPES.find((keyway) => KEYWAYS[keyway].suffix === lower) ?? null;
}
