/**
 * Error utility functions for safe error handling with unknown catch types.
 */

import type { ErrorCode } from './error-codes';
import { WorkbenchError } from './errors';

/**
 * Extract a human-readable message from an unknown error value.
 * Use in catch blocks: `catch (err: unknown) { log(toErrorMessage(err)); }`
 */
export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return String(err);
}

/** Serializable description of a failure, as stored in records */
export interface ErrorDetail {
  code: ErrorCode;
  message: string;
  context: Record<string, string>;
}

/**
 * Convert a caught value into an ErrorDetail.
 * Non-workbench errors take the fallback code.
 */
export function toErrorDetail(err: unknown, fallback: ErrorCode): ErrorDetail {
  if (err instanceof WorkbenchError) {
    return { code: err.code, message: err.message, context: { ...err.context } };
  }
  return { code: fallback, message: toErrorMessage(err), context: {} };
}
