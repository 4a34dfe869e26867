import { REQUIRED_FIELDS, isRequiredField, validateReceipt } from "../schema/index.js";
import type { ReceiptDocument, RequiredField } from "../types/receipt.js";

/**
 * Required keys absent from the receipt, in canonical order
 * (never the input's key order).
 */
export function missingFields(receipt: ReceiptDocument): RequiredField[] {
  if (validateReceipt(receipt)) return [];

  const missing = new Set<RequiredField>();
  for (const err of validateReceipt.errors ?? []) {
    if (err.keyword !== "required" || err.instancePath !== "") continue;
    const name: unknown = err.params.missingProperty;
    if (typeof name === "string" && isRequiredField(name)) missing.add(name);
  }
  return REQUIRED_FIELDS.filter((field) => missing.has(field));
}
