export type SkuCodecErrorCode =
  | "MalformedSku"
  | "UnknownShapeCode"
  | "InvalidKeywayForDie"
  | "UnsupportedPrecision"
  | "InvalidDimension"
  | "InvalidDescriptor";

export type LookupIndexErrorCode = "EmptyDataset" | "IndexNotReady";

export class SkuCodecError extends Error {
  readonly code: SkuCodecErrorCode;
  readonly sku: string | null;

  constructor(code: SkuCodecErrorCode, message: string, sku: string | null = null) {
    super(message);
    this.name = "SkuCodecError";
    this.code = code;
    this.sku = sku;
  }
}

export class LookupIndexError extends Error {
  readonly code: LookupIndexErrorCode;

  constructor(code: LookupIndexErrorCode, message: string) {
    super(message);
    this.name = "LookupIndexError";
    this.code = code;
  }
}

export function isSkuCodecError(error: unknown): error is SkuCodecError {
  return error instanceof SkuCodecError;
}
