/**
 * src/cli/verify.ts
 * Check a receipt JSON for required fields and placeholder-only endpoints.
 * No cryptography: signatures, TSA tokens and log entries are never verified.
 *
 * Usage:
 *   tsx src/index.ts --receipt samples/receipt.example.json
 *   tsx src/index.ts --receipt <file.json> --policy <policy.yml> --format json
 *
 * Exit code:
 *   0 = passed
 *   1 = failed, bad usage, or receipt/policy missing or undecodable
 */

import { Command, CommanderError, Option } from "commander";
import type { OutputFormat } from "../types/receipt.js";
import { OUTPUT_FORMATS, render } from "../report/index.js";
import { loadPolicy, loadReceipt, verifyReceipt, yamlPolicyParser, type PolicyParser } from "../verify/index.js";
import { VerifyError } from "../utils/errors.js";
import { logger } from "../utils/logger.js";

export const VERSION = "0.1.0";

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface CliDeps {
  /** YAML capability for --policy; omit it and the policy is ignored. */
  policyParser?: PolicyParser;
}

export const processIO: CliIO = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

type VerifyOptions = {
  receipt: string;
  policy?: string;
  format: OutputFormat;
};

function buildProgram(io: CliIO): Command {
  return new Command()
    .name("receipt-verify")
    .description("Public-safe skeleton verifier (no cryptography).")
    .version(VERSION)
    .requiredOption("--receipt <path>", "path to receipt.json")
    .option("--policy <path>", "path to policy.yml (optional, not enforced)")
    .addOption(
      new Option("--format <format>", "output format")
        .choices(OUTPUT_FORMATS)
        .default("markdown")
    )
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text),
    });
}

/** Parse argv, verify, print. Returns the process exit code. */
export function main(
  argv: string[],
  io: CliIO = processIO,
  deps: CliDeps = { policyParser: yamlPolicyParser }
): number {
  const program = buildProgram(io);
  try {
    program.parse(argv, { from: "user" });
  } catch (e) {
    // --help, --version and usage errors; commander has already printed
    if (e instanceof CommanderError) return e.exitCode;
    throw e;
  }
  const opts = program.opts<VerifyOptions>();

  try {
    const receipt = loadReceipt(opts.receipt);
    // loaded for forward compatibility only; nothing is enforced yet
    loadPolicy(opts.policy, deps.policyParser);

    const result = verifyReceipt(receipt);
    io.stdout(render(result, opts.format));
    logger.info("Verification finished", { receipt: opts.receipt, passed: result.passed });
    return result.passed ? 0 : 1;
  } catch (e) {
    if (e instanceof VerifyError) {
      io.stderr(`${e.message}\n`);
      return 1;
    }
    throw e;
  }
}
