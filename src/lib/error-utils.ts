/**
 * Error handling utilities for consistent error message extraction
 */

import type { ZodError } from "zod";

/**
 * Extract a user-friendly message from an unknown error.
 * Handles Error instances, strings, and unknown types safely.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return "An unexpected error occurred";
}

/**
 * Describe the first zod issue as "path: message".
 */
export function formatZodError(error: ZodError): string {
  const firstError = error.issues[0];
  if (!firstError) return "Invalid value";
  const fieldPath = firstError.path.join(".");
  return fieldPath ? `${fieldPath}: ${firstError.message}` : firstError.message;
}

export type ParseErrorCode =
  | "unreadable"
  | "unknown-layout"
  | "ambiguous-layout"
  | "missing-leg"
  | "missing-route"
  | "missing-timestamp";

/**
 * An OFP that cannot be turned into a flight plan record.
 * Fatal for the cycle; the same document is not parsed again.
 */
export class ParseError extends Error {
  readonly code: ParseErrorCode;

  constructor(code: ParseErrorCode, message: string) {
    super(message);
    this.name = "ParseError";
    this.code = code;
  }
}
