import { describe, expect, it } from "vitest";
import { isSkuCodecError } from "@/lib/sku/errors";
import { buildSku, parseSku, thousandthsToDimension } from "@/lib/sku/parse";

function errorCode(fn: () => unknown): string | null {
  try {
    fn();
    return null;
  } catch (error) {
    return isSkuCodecError(error) ? error.code : "unexpected";
  }
}

describe("parseSku", () => {
  it("parses a round punch without a keyway code", () => {
    expect(parseSku("VPL-RND-0375")).toEqual({
      kind: "punch",
      shape: "round",
      width: { numerator: 3, denominator: 8 },
      keyway: "none",
      rawSku: "VPL-RND-0375",
    });
  });

  it("parses a two-dimension die", () => {
    const descriptor = parseSku("313-OBL-0500-0750");
    expect(descriptor).toEqual({
      kind: "die",
      shape: "oblong",
      width: { numerator: 1, denominator: 2 },
      length: { numerator: 3, denominator: 4 },
      rawSku: "313-OBL-0500-0750",
    });
    expect("keyway" in descriptor).toBe(false);
  });

  it("normalizes case and whitespace and reads keyway codes", () => {
    expect(parseSku(" vpl-hex-1031-k1 ")).toEqual({
      kind: "punch",
      shape: "hex",
      width: { numerator: 33, denominator: 32 },
      keyway: "single",
      rawSku: " vpl-hex-1031-k1 ",
    });
    expect(parseSku("VPL-REC-0250-1500-K2")).toMatchObject({
      shape: "rectangle",
      keyway: "double",
      length: { numerator: 3, denominator: 2 },
    });
  });

  it("reports unknown prefixes and shape codes as UnknownShapeCode", () => {
    expect(errorCode(() => parseSku("ABC-RND-0375"))).toBe("UnknownShapeCode");
    expect(errorCode(() => parseSku("ABC"))).toBe("UnknownShapeCode");
    expect(errorCode(() => parseSku("XYZ-OBL-0500"))).toBe("UnknownShapeCode");
    expect(errorCode(() => parseSku("ABC--12-34-56-78"))).toBe("UnknownShapeCode");
    expect(errorCode(() => parseSku("VPL-TRI-0375"))).toBe("UnknownShapeCode");
  });

  it("reports structural problems as MalformedSku", () => {
    expect(errorCode(() => parseSku(""))).toBe("MalformedSku");
    expect(errorCode(() => parseSku("   "))).toBe("MalformedSku");
    expect(errorCode(() => parseSku("VPL"))).toBe("MalformedSku");
    expect(errorCode(() => parseSku("VPL-RND"))).toBe("MalformedSku");
    expect(errorCode(() => parseSku("VPL-RND-0375-0500"))).toBe("MalformedSku");
    expect(errorCode(() => parseSku("313-OBL-0500"))).toBe("MalformedSku");
    expect(errorCode(() => parseSku("VPL-RND-375"))).toBe("MalformedSku");
    expect(errorCode(() => parseSku("VPL-RND-03A5"))).toBe("MalformedSku");
    expect(errorCode(() => parseSku("VPL-RND-0000"))).toBe("MalformedSku");
    expect(errorCode(() => parseSku("VPL-RND-0375-ZZ"))).toBe("MalformedSku");
  });

  it("rejects keyway codes on dies", () => {
    expect(errorCode(() => parseSku("313-RND-0375-K1"))).toBe("InvalidKeywayForDie");
    expect(errorCode(() => parseSku("313-OBL-0500-0750-NK"))).toBe("InvalidKeywayForDie");
  });

  it("keeps the offending SKU on the error", () => {
    try {
      parseSku("313-RND-0375-K1");
      expect.unreachable();
    } catch (error) {
      expect(isSkuCodecError(error) && error.sku).toBe("313-RND-0375-K1");
    }
  });
});

describe("thousandthsToDimension", () => {
  it("snaps to the nearest sixty-fourth within half a thousandth", () => {
    expect(thousandthsToDimension(375)).toEqual({ numerator: 3, denominator: 8 });
    expect(thousandthsToDimension(1031)).toEqual({ numerator: 33, denominator: 32 });
    expect(thousandthsToDimension(62)).toEqual({ numerator: 1, denominator: 16 });
    expect(thousandthsToDimension(63)).toEqual({ numerator: 1, denominator: 16 });
    expect(thousandthsToDimension(16)).toEqual({ numerator: 1, denominator: 64 });
  });

  it("keeps the exact value when no tick is close enough", () => {
    expect(thousandthsToDimension(10)).toEqual({ numerator: 1, denominator: 100 });
    expect(thousandthsToDimension(5)).toEqual({ numerator: 1, denominator: 200 });
  });
});

describe("buildSku", () => {
  it("writes the canonical SKU back out", () => {
    expect(buildSku(parseSku("VPL-REC-0250-1500-K2"))).toBe("VPL-REC-0250-1500-K2");
    expect(buildSku(parseSku("313-OBL-0500-0750"))).toBe("313-OBL-0500-0750");
    expect(buildSku(parseSku("vpl-hex-1031"))).toBe("VPL-HEX-1031");
  });

  it("omits the keyway code for punches without keyways", () => {
    expect(buildSku(parseSku("VPL-RND-0375-NK"))).toBe("VPL-RND-0375");
  });

  it("rejects descriptors that break the shape arity", () => {
    expect(
      errorCode(() =>
        buildSku({
          kind: "die",
          shape: "oblong",
          width: { numerator: 1, denominator: 2 },
          rawSku: "manual",
        }),
      ),
    ).toBe("InvalidDescriptor");
  });
});
