/**
 * Fatal errors: each one ends the run before any report is printed.
 * Soft problems (missing fields, real endpoints) are collected instead,
 * see src/verify/index.ts.
 */

export class VerifyError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'VerifyError';
  }
}

export type DocumentKind = 'receipt' | 'policy';

export class NotFoundError extends VerifyError {
  public readonly kind: DocumentKind;
  public readonly path: string;

  constructor(kind: DocumentKind, path: string) {
    super(`${kind} not found: ${path}`);
    this.name = 'NotFoundError';
    this.kind = kind;
    this.path = path;
  }
}

export class DecodeError extends VerifyError {
  public readonly kind: DocumentKind;

  constructor(kind: DocumentKind, detail: string, cause?: unknown) {
    super(`${kind === 'receipt' ? 'invalid JSON' : 'invalid YAML'}: ${detail}`, { cause });
    this.name = 'DecodeError';
    this.kind = kind;
  }
}

/** Human name of a JSON value's kind, for error messages. */
export function describeKind(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
