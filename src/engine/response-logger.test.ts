/**
 * Unit Tests for ResponseLogger and its sinks
 */

import * as fs from 'fs';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import type { LogRecord, SocketEvent } from '@/shared/types/record-types';
import { CallbackSink, JsonLinesSink, MemorySink, ResponseLogger, type LogSink } from './response-logger';
import { LogWriteError } from '../shared/errors';
import { ERROR_LogWriteFailed } from '../shared/error-codes';
import { createTempDir, removeTempDir } from '../mock-server/test-helpers';

function socketEvent(event: string, payload: unknown = null): SocketEvent {
  return { kind: 'socket-event', event, payload, timestamp: '2026-01-01T00:00:00.000Z', source: 'http://ws.test' };
}

const failingSink: LogSink = {
  name: 'broken',
  append: () => {
    throw new Error('disk full');
  },
};

describe('ResponseLogger', () => {
  it('writes each record to every sink in order', () => {
    const first = new MemorySink();
    const seen: string[] = [];
    const logger = new ResponseLogger([first, new CallbackSink('names', record => {
      if (record.kind === 'socket-event') seen.push(record.event);
    })]);

    logger.append(socketEvent('a'));
    logger.append(socketEvent('b'));

    expect(first.getRecords().map(record => record.kind === 'socket-event' ? record.event : '')).toEqual(['a', 'b']);
    expect(seen).toEqual(['a', 'b']);
  });

  it('keeps writing to the other sinks and then throws', () => {
    const memory = new MemorySink();
    const logger = new ResponseLogger([failingSink, memory]);

    let caught: unknown;
    try {
      logger.append(socketEvent('a'));
    } catch (err: unknown) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(LogWriteError);
    if (caught instanceof LogWriteError) {
      expect(caught.code).toBe(ERROR_LogWriteFailed);
      expect(caught.message).toBe('Failed to write record: broken: disk full');
    }
    expect(memory.getRecords()).toHaveLength(1);
  });

  it('adds and removes sinks', () => {
    const memory = new MemorySink();
    const logger = new ResponseLogger();
    logger.addSink(memory);
    logger.append(socketEvent('kept'));
    logger.removeSink(memory);
    logger.append(socketEvent('dropped'));

    expect(memory.getRecords()).toHaveLength(1);
  });
});

describe('MemorySink', () => {
  it('returns copies and can be cleared', () => {
    const sink = new MemorySink();
    sink.append(socketEvent('a'));
    const records = sink.getRecords();
    records.pop();

    expect(sink.getRecords()).toHaveLength(1);
    sink.clear();
    expect(sink.getRecords()).toEqual([]);
  });
});

describe('JsonLinesSink', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('creates the directory and writes one JSON document per line', () => {
    const filePath = path.join(dir, 'nested', 'log.jsonl');
    const sink = new JsonLinesSink(filePath);
    const records: LogRecord[] = [socketEvent('a', { n: 1 }), socketEvent('b', 'line\nbreak')];

    records.forEach(record => sink.append(record));

    const lines = fs.readFileSync(filePath, 'utf8').split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe('');
    expect(JSON.parse(lines[0])).toEqual(records[0]);
    expect(JSON.parse(lines[1])).toEqual(records[1]);
  });
});
