/**
 * ResponseLogger - append-only record sink shared by the request loop and socket monitors.
 *
 * append() is synchronous: each sink writes the whole record before returning,
 * so records from concurrent producers never interleave.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { LogRecord } from '@/shared/types/record-types';
import { LogWriteError } from '../shared/errors';
import { toErrorMessage } from '../shared/error-utils';

export interface LogSink {
  readonly name: string;
  append(record: LogRecord): void;
}

/** One JSON document per line */
export class JsonLinesSink implements LogSink {
  readonly name = 'jsonl';
  private directoryReady = false;

  constructor(readonly filePath: string) {}

  append(record: LogRecord): void {
    if (!this.directoryReady) {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      this.directoryReady = true;
    }
    fs.appendFileSync(this.filePath, JSON.stringify(record) + '\n', 'utf8');
  }
}

/** Keeps records in memory, in append order */
export class MemorySink implements LogSink {
  readonly name = 'memory';
  private records: LogRecord[] = [];

  append(record: LogRecord): void {
    this.records.push(record);
  }

  getRecords(): LogRecord[] {
    return [...this.records];
  }

  clear(): void {
    this.records = [];
  }
}

/** Forwards each record to a function, e.g. the CLI's live display */
export class CallbackSink implements LogSink {
  constructor(readonly name: string, private onRecord: (record: LogRecord) => void) {}

  append(record: LogRecord): void {
    this.onRecord(record);
  }
}

export class ResponseLogger {
  private sinks: LogSink[];

  constructor(sinks: LogSink[] = []) {
    this.sinks = [...sinks];
  }

  addSink(sink: LogSink): void {
    this.sinks.push(sink);
  }

  removeSink(sink: LogSink): void {
    this.sinks = this.sinks.filter(existing => existing !== sink);
  }

  /**
   * Write a record to every sink. A failing sink does not stop the others;
   * the failures are thrown together afterwards.
   */
  append(record: LogRecord): void {
    const failures: string[] = [];
    for (const sink of this.sinks) {
      try {
        sink.append(record);
      } catch (err: unknown) {
        failures.push(`${sink.name}: ${toErrorMessage(err)}`);
      }
    }

    if (failures.length > 0) {
      throw new LogWriteError(failures);
    }
  }
}
