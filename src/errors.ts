import type { ValidationErrorKind } from './types/scanner.js';

export class ValidationError extends Error {
  readonly kind: ValidationErrorKind;

  constructor(kind: ValidationErrorKind, message: string) {
    super(message);
    this.name = 'ValidationError';
    this.kind = kind;
  }
}

export class ScanFailedError extends Error {
  readonly scanned: number;
  readonly total: number;

  constructor(message: string, scanned: number, total: number) {
    super(message);
    this.name = 'ScanFailedError';
    this.scanned = scanned;
    this.total = total;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

// errno-style code of a caught value, e.g. ECONNREFUSED
export function errorCode(error: unknown): string | null {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
}
