import type { ReceiptDocument, ValidationResult } from "../types/receipt.js";
import { logger } from "../utils/logger.js";
import { missingFields } from "./fields.js";
import { checkPlaceholders } from "./placeholders.js";

export { missingFields } from "./fields.js";
export { checkPlaceholders } from "./placeholders.js";
export { loadPolicy, loadReceipt, yamlPolicyParser, type PolicyParser } from "./loaders.js";

/**
 * Run every check and collect all problems at once rather than stopping
 * at the first. `warnings` is reserved: no check emits one yet.
 */
export function verifyReceipt(receipt: ReceiptDocument): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const missing = missingFields(receipt);
  if (missing.length) {
    errors.push(`missing required fields: ${missing.join(", ")}`);
  }

  const problems = checkPlaceholders(receipt);
  errors.push(...problems);

  logger.debug("Receipt checked", { missing: missing.length, placeholderProblems: problems.length });
  return { passed: errors.length === 0, errors, warnings };
}
