/**
 * src/verify/loaders.ts
 * Disk → memory for the receipt (JSON) and the optional policy (YAML).
 *
 * Parsing YAML is an injected capability: without a parser the policy
 * degrades to `{}` instead of failing the run.
 */

import fs from "node:fs";
import * as yaml from "js-yaml";
import type { JsonValue, Policy, ReceiptDocument } from "../types/receipt.js";
import { DecodeError, NotFoundError, describeKind } from "../utils/errors.js";
import { logger } from "../utils/logger.js";

export interface PolicyParser {
  parse(text: string): unknown;
}

export const yamlPolicyParser: PolicyParser = {
  parse: (text) => yaml.load(text),
};

// one line: js-yaml appends a multi-line source excerpt to its messages
function messageOf(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return message.split("\n")[0].trim();
}

// fatal: malformed UTF-8 is an error, never replaced with U+FFFD
const utf8 = new TextDecoder("utf-8", { fatal: true });

function readText(kind: "receipt" | "policy", filePath: string): string {
  if (!fs.existsSync(filePath)) {
    throw new NotFoundError(kind, filePath);
  }
  let bytes: Buffer;
  try {
    bytes = fs.readFileSync(filePath);
  } catch (e) {
    // exists but unreadable (a directory, no permission)
    throw new DecodeError(kind, messageOf(e), e);
  }
  try {
    return utf8.decode(bytes);
  } catch (e) {
    throw new DecodeError(kind, `not valid UTF-8 (${messageOf(e)})`, e);
  }
}

function isJsonObject(value: JsonValue): value is ReceiptDocument {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function loadReceipt(filePath: string): ReceiptDocument {
  const text = readText("receipt", filePath);
  let parsed: JsonValue;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    throw new DecodeError("receipt", messageOf(e), e);
  }
  if (!isJsonObject(parsed)) {
    throw new DecodeError("receipt", `receipt must be a JSON object, got ${describeKind(parsed)}`);
  }
  logger.debug("Loaded receipt", { path: filePath, keys: Object.keys(parsed).length });
  return parsed;
}

function isPolicy(value: unknown): value is Policy {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Load the policy file. It is parsed for shape only; nothing consults it yet.
 */
export function loadPolicy(filePath: string | undefined, parser?: PolicyParser): Policy {
  if (!filePath) return {};
  if (!fs.existsSync(filePath)) {
    throw new NotFoundError("policy", filePath);
  }
  if (!parser) {
    logger.warn("No policy parser available, policy ignored", { path: filePath });
    return {};
  }

  const text = readText("policy", filePath);
  let parsed: unknown;
  try {
    parsed = parser.parse(text);
  } catch (e) {
    throw new DecodeError("policy", messageOf(e), e);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isPolicy(parsed)) {
    logger.warn("Policy is not a mapping, policy ignored", { path: filePath, kind: describeKind(parsed) });
    return {};
  }
  logger.debug("Loaded policy (not enforced)", { path: filePath, keys: Object.keys(parsed).length });
  return parsed;
}
