/**
 * src/report/index.ts
 * Renders a ValidationResult for stdout. Both renderers are pure and return
 * the complete text, trailing newline included.
 */

import type { OutputFormat, ValidationResult } from "../types/receipt.js";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["markdown", "json"];

function section(title: string, items: string[]): string[] {
  if (!items.length) return [];
  return [`### ${title}`, ...items.map((item) => `- ${item}`), ""];
}

export function renderMarkdown({ passed, errors, warnings }: ValidationResult): string {
  const heading = passed
    ? "## ✅ Receipt Skeleton Verification Passed"
    : "## ❌ Receipt Skeleton Verification Failed";
  const lines = [heading, "", ...section("Errors", errors), ...section("Warnings", warnings)];
  return `${lines.join("\n")}\n`;
}

export function renderJson({ passed, errors, warnings }: ValidationResult): string {
  return `${JSON.stringify({ passed, errors, warnings }, null, 2)}\n`;
}

export function render(result: ValidationResult, format: OutputFormat): string {
  return format === "json" ? renderJson(result) : renderMarkdown(result);
}
