export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/** A receipt exactly as loaded from disk: only presence of its keys is checked. */
export type ReceiptDocument = JsonObject;

export type RequiredField =
  | 'id'
  | 'ts'
  | 'subject'
  | 'input_hash'
  | 'output_hash'
  | 'env'
  | 'merkle'
  | 'tsa'
  | 'transparency'
  | 'signatures';

export interface TransparencyBlock {
  rekorUrl?: JsonValue;     // transparency.rekor_url, undefined when absent
  mirrorUrls: JsonValue[];  // transparency.mirror_urls, [] when absent or not a list
}

export interface SignatureEntry {
  index: number;            // position in receipt.signatures (0-based)
  signer: JsonValue;        // "" when the entry carries no signer key
}

/**
 * Typed accessors over the loosely shaped parts of a receipt.
 * Anything of the wrong shape collapses to "absent" here rather than erroring.
 */
export interface ReceiptView {
  transparency: TransparencyBlock | null;
  signatures: SignatureEntry[];
}

export type Policy = Record<string, unknown>;

export interface ValidationResult {
  passed: boolean;
  errors: string[];
  warnings: string[];
}

export type OutputFormat = 'markdown' | 'json';
