/**
 * Terminal rendering of execution results and socket records
 */

import type { HttpRequestDefinition } from '@/shared/types/project-types';
import type { ExecutionResult, LogRecord } from '@/shared/types/record-types';

export function formatSeconds(durationMs: number): string {
  return (durationMs / 1000).toFixed(2);
}

/** Strings print as-is, everything else as indented JSON */
export function formatBody(body: unknown): string {
  if (typeof body === 'string') return body;
  return JSON.stringify(body, null, 2) ?? String(body);
}

export function formatSending(definition: HttpRequestDefinition): string {
  return `Sending ${definition.method} ${definition.endpoint} (${definition.desc})...`;
}

export function formatResult(result: ExecutionResult): string[] {
  const lines: string[] = [];

  if (result.response) {
    lines.push(`Received response ${result.response.status} in ${formatSeconds(result.response.durationMs)}s:`);
    lines.push(formatBody(result.response.body));
    if (result.response.parseError) {
      lines.push(`(${result.response.parseError})`);
    }
  }

  switch (result.status) {
    case 'completed':
      if (result.callback) {
        lines.push(result.callback.applied
          ? `Callback "${result.callback.name}" applied`
          : result.callback.error?.message ?? `Callback "${result.callback.name}" failed`);
      }
      break;
    case 'resolution-failed':
      lines.push(`Could not build request: ${result.error?.message ?? 'unknown error'}`);
      break;
    case 'transport-failed':
      lines.push(`Request failed: ${result.error?.message ?? 'unknown error'}`);
      break;
    case 'cancelled':
      lines.push(result.error?.message ?? 'Request cancelled');
      break;
  }

  return lines;
}

/** One line for a record coming from a socket monitor */
export function formatRecord(record: LogRecord): string {
  switch (record.kind) {
    case 'socket-event':
      return `[${record.source}] ${record.event}: ${JSON.stringify(record.payload)}`;
    case 'monitor':
      return `[${record.source}] ${record.message}`;
    case 'http':
      return `${record.method} ${record.url ?? record.endpoint} -> ${record.statusCode ?? record.status}`;
  }
}
