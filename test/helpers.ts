import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { CliIO } from "../src/cli/verify.js";
import type { JsonObject } from "../src/types/receipt.js";

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "receipt-verify-"));
}

export function writeFile(dir: string, name: string, contents: string): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, contents, "utf8");
  return file;
}

/** A receipt that passes every check. */
export function validReceipt(): JsonObject {
  return {
    id: "rcpt-test",
    ts: "2026-01-01T00:00:00Z",
    subject: "test/subject",
    input_hash: "sha256:aa",
    output_hash: "sha256:bb",
    env: {},
    merkle: { root: "sha256:cc" },
    tsa: { url: "tsa://rfc3161.example.invalid" },
    transparency: { rekor_url: "https://rekor.example.invalid/v1" },
    signatures: [{ signer: "kms+example://key1" }],
  };
}

export class CapturedIO implements CliIO {
  out = "";
  err = "";

  stdout(text: string): void {
    this.out += text;
  }

  stderr(text: string): void {
    this.err += text;
  }
}

export function captureIO(): CapturedIO {
  return new CapturedIO();
}
