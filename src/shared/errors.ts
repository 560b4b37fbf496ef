/**
 * Error classes, one per error kind.
 * Each carries its code and the context needed to diagnose it without reading logs.
 */

import {
  ERROR_CallbackFailure,
  ERROR_ConfigInvalid,
  ERROR_LogWriteFailed,
  ERROR_RequestCancelled,
  ERROR_SocketDisconnected,
  ERROR_TransportFailure,
  ERROR_UnboundVariable,
  type ErrorCode,
} from './error-codes';

export class WorkbenchError extends Error {
  readonly code: ErrorCode;
  readonly context: Readonly<Record<string, string>>;

  constructor(code: ErrorCode, message: string, context: Record<string, string> = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.context = Object.freeze({ ...context });
  }
}

/** A `{{name}}` placeholder has no value in the variable snapshot */
export class UnboundVariableError extends WorkbenchError {
  constructor(readonly variable: string, readonly fieldPath: string) {
    super(
      ERROR_UnboundVariable,
      `Unbound variable "${variable}" in ${fieldPath}`,
      { variable, fieldPath },
    );
  }
}

export type TransportFailureReason = 'network' | 'timeout' | 'aborted';

export class TransportError extends WorkbenchError {
  constructor(readonly reason: TransportFailureReason, readonly url: string, detail: string) {
    super(
      reason === 'aborted' ? ERROR_RequestCancelled : ERROR_TransportFailure,
      reason === 'timeout' ? `Request timed out: ${detail}` : detail,
      { reason, url },
    );
  }
}

export class CallbackFailureError extends WorkbenchError {
  constructor(readonly callbackName: string, readonly originalError: unknown, message: string) {
    super(ERROR_CallbackFailure, `Callback "${callbackName}" failed: ${message}`, { callback: callbackName });
  }
}

export class ConfigInvalidError extends WorkbenchError {
  constructor(readonly source: string, readonly issues: string[]) {
    super(
      ERROR_ConfigInvalid,
      `Invalid project ${source}:\n${issues.map(issue => `  - ${issue}`).join('\n')}`,
      { source },
    );
  }
}

export class SocketDisconnectedError extends WorkbenchError {
  constructor(readonly source: string, readonly reason: string) {
    super(ERROR_SocketDisconnected, `Disconnected from ${source}: ${reason}`, { source, reason });
  }
}

export class RequestCancelledError extends WorkbenchError {
  constructor(description: string) {
    super(ERROR_RequestCancelled, `Request cancelled: ${description}`, { request: description });
  }
}

export class LogWriteError extends WorkbenchError {
  constructor(readonly failures: string[]) {
    super(ERROR_LogWriteFailed, `Failed to write record: ${failures.join('; ')}`);
  }
}
