/**
 * src/verify/placeholders.ts
 * Keeps committed receipts from pointing at real infrastructure: the
 * transparency-log URL and every signer must use reserved placeholder values.
 *
 * Only string values are prefix-checked; numbers, null etc. are skipped.
 */

import type {
  JsonValue,
  ReceiptDocument,
  ReceiptView,
  SignatureEntry,
  TransparencyBlock,
} from "../types/receipt.js";

export const PLACEHOLDER_URL_PREFIXES = [
  "https://example.invalid",
  "https://rekor.example.invalid",
  "tsa://rfc3161.example.invalid",
] as const;

export const PLACEHOLDER_KMS_PREFIXES = ["kms+example://"] as const;

type JsonRecord = { [key: string]: JsonValue };

function asRecord(value: JsonValue | undefined): JsonRecord | null {
  return typeof value === "object" && value !== null && !Array.isArray(value) ? value : null;
}

function transparencyOf(receipt: ReceiptDocument): TransparencyBlock | null {
  const block = asRecord(receipt.transparency);
  if (!block) return null;
  const mirrors = block.mirror_urls;
  return {
    rekorUrl: block.rekor_url,
    mirrorUrls: Array.isArray(mirrors) ? mirrors : [],
  };
}

function signaturesOf(receipt: ReceiptDocument): SignatureEntry[] {
  const list = receipt.signatures;
  if (!Array.isArray(list)) return [];
  return list.map((entry, index) => {
    const sig = asRecord(entry);
    const signer = sig && "signer" in sig ? sig.signer : "";
    return { index, signer };
  });
}

export function viewOf(receipt: ReceiptDocument): ReceiptView {
  return {
    transparency: transparencyOf(receipt),
    signatures: signaturesOf(receipt),
  };
}

/** null, false, 0, "", [] and {} count as "not set". */
function isSet(value: JsonValue | undefined): boolean {
  if (value === undefined || value === null || value === false || value === 0 || value === "") {
    return false;
  }
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === "object") return Object.keys(value).length > 0;
  return true;
}

/** rekor_url wins when set, else the first mirror. */
export function transparencyUrl(block: TransparencyBlock | null): JsonValue | undefined {
  if (!block) return undefined;
  if (isSet(block.rekorUrl)) return block.rekorUrl;
  return block.mirrorUrls.length ? block.mirrorUrls[0] : undefined;
}

export function isPlaceholderUrl(value: string): boolean {
  return PLACEHOLDER_URL_PREFIXES.some((p) => value.startsWith(p));
}

export function isPlaceholderKms(value: string): boolean {
  return PLACEHOLDER_KMS_PREFIXES.some((p) => value.startsWith(p));
}

const ESCAPES: Record<string, string> = {
  "\\": "\\\\",
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
};

// C0, DEL and C1 controls
function isControl(code: number): boolean {
  return code < 0x20 || (code >= 0x7f && code <= 0x9f);
}

function escapeChar(ch: string, quote: string): string {
  if (ch === quote) return `\\${ch}`;
  const named = ESCAPES[ch];
  if (named) return named;
  const code = ch.codePointAt(0) ?? 0;
  return isControl(code) ? `\\x${code.toString(16).padStart(2, "0")}` : ch;
}

/**
 * Quote a value for a problem message: single quotes, or double quotes
 * when the value holds a ' and no ". Control characters come out as
 * escapes (\n, \x1b), everything else printable stays as is.
 */
export function quoteValue(value: string): string {
  const quote = value.includes("'") && !value.includes('"') ? '"' : "'";
  let out = "";
  for (const ch of value) out += escapeChar(ch, quote);
  return `${quote}${out}${quote}`;
}

export function checkPlaceholders(receipt: ReceiptDocument): string[] {
  const problems: string[] = [];
  const view = viewOf(receipt);

  const url = transparencyUrl(view.transparency);
  if (typeof url === "string" && !isPlaceholderUrl(url)) {
    problems.push(`transparency URL must use placeholder domain: ${quoteValue(url)}`);
  }

  for (const { index, signer } of view.signatures) {
    if (typeof signer === "string" && !isPlaceholderKms(signer)) {
      problems.push(`signatures[${index}].signer must use placeholder KMS: ${quoteValue(signer)}`);
    }
  }

  return problems;
}
