import { describe, it, expect } from "vitest";
import receiptSchema from "../src/schema/receipt.schema.json" with { type: "json" };
import { REQUIRED_FIELDS } from "../src/schema/index.js";
import { missingFields } from "../src/verify/fields.js";
import { validReceipt } from "./helpers.js";

describe("missingFields", () => {
  it("keeps the schema and the canonical list in sync", () => {
    expect(receiptSchema.required).toEqual([...REQUIRED_FIELDS]);
  });

  it("returns nothing for a complete receipt", () => {
    expect(missingFields(validReceipt())).toEqual([]);
  });

  it("lists every field of an empty object in canonical order", () => {
    expect(missingFields({})).toEqual([
      "id",
      "ts",
      "subject",
      "input_hash",
      "output_hash",
      "env",
      "merkle",
      "tsa",
      "transparency",
      "signatures",
    ]);
  });

  it("ignores the input's key order", () => {
    const { merkle: _merkle, tsa: _tsa, ...rest } = validReceipt();
    const reversed = Object.fromEntries(Object.entries(rest).reverse());
    expect(missingFields(reversed)).toEqual(["merkle", "tsa"]);
  });

  it("counts a key holding null as present", () => {
    expect(missingFields({ ...validReceipt(), env: null, signatures: null })).toEqual([]);
  });

  it("does not care about extra keys", () => {
    const { signatures: _signatures, ...rest } = validReceipt();
    expect(missingFields({ ...rest, extra: true })).toEqual(["signatures"]);
  });
});
