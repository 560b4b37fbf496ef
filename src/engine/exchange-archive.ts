/**
 * ExchangeArchiveSink - one file per HTTP exchange, grouped by endpoint.
 *
 *   <output>/<METHOD base-endpoint>/<timestamp> <METHOD endpoint?query>.json   request + response
 *   <output>/<METHOD base-endpoint>/raw/<same name>.txt                        pretty-printed body (text as-is)
 *
 * Only results that reached the server are archived.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { ExecutionResult, LogRecord } from '@/shared/types/record-types';
import type { LogSink } from './response-logger';

const STRIPPED_PREFIXES = ['https://', 'http://', 'wss://', 'www.', '/'];

/**
 * Turn a URL-ish label into something usable as a file name.
 * Each known prefix is stripped once, in order.
 */
export function toFileSafeName(input: string): string {
  let name = input;
  for (const prefix of STRIPPED_PREFIXES) {
    if (name.startsWith(prefix)) {
      name = name.slice(prefix.length);
    }
  }
  return name
    .replace(/\//g, '-')
    .replace(/\+/g, '')
    .replace(/\?/g, '-')
    .replace(/[<>:"\\|*]/g, '_');
}

/** Directory grouping every call to the same endpoint template */
export function bucketLabel(result: ExecutionResult): string {
  const base = result.request ? toFileSafeName(result.request.apiBase) : '';
  return toFileSafeName(`${result.method} ${base}${result.endpointTemplate}`);
}

/** `2026-03-01T09:15:42.120Z` + `GET /items?page=2` → `2026-03-01T09-15-42 GET items-page=2` */
export function exchangeFileName(result: ExecutionResult): string {
  const stamp = result.timestamp.slice(0, 19).replace(/:/g, '-');
  const query = result.url && result.url.includes('?') ? result.url.slice(result.url.indexOf('?')) : '';
  const line = `${result.method} ${result.endpoint}${query}`.replace('/', '');
  return toFileSafeName(`${stamp} ${line}`);
}

export class ExchangeArchiveSink implements LogSink {
  readonly name = 'archive';

  constructor(readonly outputDir: string) {}

  append(record: LogRecord): void {
    if (record.kind !== 'http' || !record.request || !record.response) {
      return;
    }

    const bucketDir = path.join(this.outputDir, bucketLabel(record));
    const rawDir = path.join(bucketDir, 'raw');
    fs.mkdirSync(rawDir, { recursive: true });

    const fileName = exchangeFileName(record);
    const exchange = {
      request: {
        ...record.request,
        timestamp: record.timestamp,
      },
      response: {
        statusCode: record.response.status,
        durationMs: record.response.durationMs,
        body: record.response.body,
        ...(record.response.parseError ? { error: record.response.parseError } : {}),
      },
    };

    fs.writeFileSync(path.join(bucketDir, `${fileName}.json`), JSON.stringify(exchange, null, 2), 'utf8');
    const body = record.response.body;
    const raw = typeof body === 'string' ? body : JSON.stringify(body, null, 2);
    fs.writeFileSync(path.join(rawDir, `${fileName}.txt`), raw, 'utf8');
  }
}
