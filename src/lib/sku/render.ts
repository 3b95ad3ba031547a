import type { CodecOptions, Dimension, ParsedDescription, ToolDescriptor } from "@/lib/types";
import { KEYWAYS, SHAPES, TOOL_SHAPES, keywayFromSuffix, shapeFromName } from "./code-tables";
import { formatDimension, parseFraction } from "./fraction";
import { assertDescriptorArity } from "./parse";

const SHAPE_NAMES = TOOL_SHAPES.map((shape) => SHAPES[shape].name).join("|");
const DESCRIPTION_RE = new RegExp(
  `^(.+?)\\s+(${SHAPE_NAMES})\\s+(punch|die)(,\\s*.+)?$`,
  "i",
);

export function renderDescription(descriptor: ToolDescriptor, options: CodecOptions = {}): string {
  assertDescriptorArity(descriptor);

  const width = formatDimension(descriptor.width, options);
  const size = descriptor.length
    ? `${width} x ${formatDimension(descriptor.length, options)}`
    : width;
  const keyway = descriptor.kind === "punch" ? KEYWAYS[descriptor.keyway].suffix : "";

  return `${size} ${SHAPES[descriptor.shape].name} ${descriptor.kind}${keyway}`;
}

function readDimension(text: string): Dimension | null {
  try {
    return parseFraction(text);
  } catch {
    return null;
  }
}

/**
 * Reads a canonical description back into its attributes. Returns null for
 * free-text descriptions that do not follow the rendered layout.
 */
export function parseDescription(text: string): ParsedDescription | null {
  const match = text.trim().match(DESCRIPTION_RE);
  if (!match) return null;

  const shape = shapeFromName(match[2]);
  if (!shape) return null;
  const kind = match[3].toLowerCase() === "punch" ? "punch" : "die";

  const sizeParts = match[1].split(/\s+x\s+/i);
  if (sizeParts.length !== SHAPES[shape].dimensions) return null;
  const width = readDimension(sizeParts[0]);
  const length = sizeParts.length === 2 ? readDimension(sizeParts[1]) : null;
  if (!width || (sizeParts.length === 2 && !length)) return null;

  const suffix = match[4];
  if (kind === "die") {
    if (suffix) return null;
    return { kind, shape, width, length, keyway: null };
  }

  const keyway = suffix ? keywayFromSuffix(suffix.replace(/^,\s*/, ", ")) : null;
  if (suffix && !keyway) return null;
  return { kind, shape, width, length, keyway };
}
