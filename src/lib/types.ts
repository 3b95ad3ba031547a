export type ToolKind = "punch" | "die";

export type ToolShape = "round" | "oblong" | "rectangle" | "hex" | "square";

export type KeywayType = "none" | "single" | "double";

/** A positive rational dimension in inches, kept in lowest terms. */
export interface Dimension {
  numerator: number;
  denominator: number;
}

interface ToolDescriptorBase {
  shape: ToolShape;
  width: Dimension;
  /** Present only for two-dimension shapes (oblong, rectangle). */
  length?: Dimension;
  rawSku: string;
}

export interface PunchDescriptor extends ToolDescriptorBase {
  kind: "punch";
  keyway: KeywayType;
}

export interface DieDescriptor extends ToolDescriptorBase {
  kind: "die";
}

export type ToolDescriptor = PunchDescriptor | DieDescriptor;

export interface LookupEntry {
  sku: string;
  description: string;
}

export interface ParsedDescription {
  kind: ToolKind;
  shape: ToolShape;
  width: Dimension;
  length: Dimension | null;
  keyway: KeywayType | null;
}

export interface CodecOptions {
  maxDenominator?: number;
}
