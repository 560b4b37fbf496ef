/**
 * Record types appended to the ResponseLogger.
 * Records are immutable once constructed.
 */

import type { ErrorDetail } from '../error-utils';
import type { HttpMethod, ResolvedRequest } from './project-types';

/** A response as received from the server, before any interpretation */
export interface HttpResponseData {
  readonly status: number;
  readonly statusText: string;
  readonly headers: Readonly<Record<string, string>>;
  /** Parsed JSON when the body was JSON, otherwise the raw text */
  readonly body: unknown;
  readonly text: string;
  readonly durationMs: number;
  /** Set when a non-empty body failed to parse as JSON */
  readonly parseError?: string;
}

export type ExecutionStatus =
  | 'completed'
  | 'resolution-failed'
  | 'transport-failed'
  | 'cancelled';

export interface CallbackReport {
  readonly name: string;
  readonly applied: boolean;
  readonly error?: ErrorDetail;
}

/** Outcome of one HTTP request execution */
export interface ExecutionResult {
  readonly kind: 'http';
  readonly description: string;
  readonly method: HttpMethod;
  /** Endpoint as written in the project */
  readonly endpointTemplate: string;
  /** Resolved endpoint, or the raw template when resolution failed */
  readonly endpoint: string;
  readonly url: string | null;
  readonly request: ResolvedRequest | null;
  readonly status: ExecutionStatus;
  /** HTTP status code; null when no response was received */
  readonly statusCode: number | null;
  readonly response: HttpResponseData | null;
  readonly timestamp: string;
  readonly error?: ErrorDetail;
  readonly callback?: CallbackReport;
}

/** One event received by a SocketMonitor */
export interface SocketEvent {
  readonly kind: 'socket-event';
  readonly event: string;
  readonly payload: unknown;
  readonly timestamp: string;
  readonly source: string;
}

export type MonitorNoticeType =
  | 'connecting'
  | 'connected'
  | 'disconnected'
  | 'connect-failed'
  | 'reconnecting'
  | 'gave-up'
  | 'stopped';

/** Observability record for SocketMonitor state changes */
export interface MonitorNotice {
  readonly kind: 'monitor';
  readonly notice: MonitorNoticeType;
  readonly message: string;
  readonly timestamp: string;
  readonly source: string;
  readonly error?: ErrorDetail;
}

export type LogRecord = ExecutionResult | SocketEvent | MonitorNotice;
