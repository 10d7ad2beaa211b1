// ---------------------------------------------------------------------------
// Tests for GTIN interchange encoding
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";
import { z } from "zod";

import type { GTIN } from "../../../../src/core/types.js";
import { GtinDecodeError } from "../../../../src/core/errors.js";
import {
  decodeGtin,
  encodeGtin,
  gtinJsonReplacer,
  gtinSchema,
} from "../../../../src/domain/gtin/codec.js";
import { parseGtin } from "../../../../src/domain/gtin/gtin.js";

function parsed(input: string): GTIN {
  const result = parseGtin(input);
  if (!result.ok) throw new Error(result.error.message);
  return result.value;
}

const OREO = parsed("071720539774");

describe("encodeGtin / decodeGtin", () => {
  it("encodes the canonical digit string", () => {
    expect(encodeGtin(OREO)).toBe("071720539774");
    expect(encodeGtin(parsed("0 00 12345 67890 5"))).toBe("00012345678905");
  });

  it("decodes through the full parser", () => {
    expect(decodeGtin("071720539774")).toEqual({ ok: true, value: OREO });
    expect(decodeGtin("0 71720 53977 4")).toEqual({ ok: true, value: OREO });
    expect(decodeGtin("0071720539774")).toEqual({ ok: true, value: OREO });
  });

  it("reports what it received when the value is not a string", () => {
    const fromNumber = decodeGtin(42);
    expect(fromNumber.ok).toBe(false);
    if (!fromNumber.ok) {
      expect(fromNumber.error).toBeInstanceOf(GtinDecodeError);
      expect(fromNumber.error.kind).toBe("decode_failed");
      expect(fromNumber.error.message).toBe(
        "expected a GTIN string, received number",
      );
    }

    const fromNull = decodeGtin(null);
    expect(!fromNull.ok && fromNull.error.message).toBe(
      "expected a GTIN string, received null",
    );
  });

  it("passes parse failures through", () => {
    const result = decodeGtin("071720539775");
    expect(!result.ok && result.error.kind).toBe("invalid_checksum");
  });
});

describe("gtinJsonReplacer", () => {
  it("writes nested GTINs as strings", () => {
    const json = JSON.stringify({ name: "Oreo", gtin: OREO }, gtinJsonReplacer);
    expect(json).toBe('{"name":"Oreo","gtin":"071720539774"}');
  });

  it("leaves other values alone", () => {
    const json = JSON.stringify(
      { digits: [0, 7], format: "UpcA", count: 2 },
      gtinJsonReplacer,
    );
    expect(json).toBe('{"digits":[0,7],"format":"UpcA","count":2}');
  });
});

describe("gtinSchema", () => {
  const ProductSchema = z.object({ name: z.string(), gtin: gtinSchema });

  it("parses a GTIN field out of a JSON payload", () => {
    const product = ProductSchema.parse(
      JSON.parse('{"name":"Oreo","gtin":"071720539774"}'),
    );
    expect(product.gtin).toEqual(OREO);
  });

  it("reports the error kind on a bad checksum", () => {
    const result = ProductSchema.safeParse({ name: "Oreo", gtin: "071720539775" });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues).toHaveLength(1);
      expect(result.error.issues[0]).toMatchObject({
        code: "custom",
        path: ["gtin"],
        message: "invalid GTIN checksum",
        params: { kind: "invalid_checksum" },
      });
    }
  });

  it("reports the digit count on a bad length", () => {
    const result = gtinSchema.safeParse("12345");
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]).toMatchObject({
        message: "unsupported GTIN length: 5",
        params: { kind: "invalid_length", length: 5 },
      });
    }
  });

  it("rejects non-string input before parsing", () => {
    const result = gtinSchema.safeParse(71720539774);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].code).toBe("invalid_type");
    }
  });
});
