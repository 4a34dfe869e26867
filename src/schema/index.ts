/**
 * src/schema/index.ts
 * AJV (2020-12) validator for the receipt skeleton.
 * The schema only pins which top-level keys must exist.
 */

import Ajv2020Import from "ajv/dist/2020.js";
import receipt from "./receipt.schema.json" with { type: "json" };
import type { ReceiptDocument, RequiredField } from "../types/receipt.js";

// ajv ships CommonJS; under NodeNext the default import is module.exports
const Ajv2020 = Ajv2020Import.default;

export const ajv = new Ajv2020({
  allErrors: true,
  strict: "log",
});

/** Canonical order of the required top-level keys. */
export const REQUIRED_FIELDS: readonly RequiredField[] = [
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
];

export const validateReceipt = ajv.compile<ReceiptDocument>(receipt);

export function isRequiredField(name: string): name is RequiredField {
  return (REQUIRED_FIELDS as readonly string[]).includes(name);
}
