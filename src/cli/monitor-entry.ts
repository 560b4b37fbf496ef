/**
 * Socket.IO menu entries: print the monitor's records until the operator stops it.
 */

import type { SocketRequestDefinition } from '@/shared/types/project-types';
import type { LogRecord } from '@/shared/types/record-types';
import type { ProjectSession } from '../engine/project-session';
import { CallbackSink } from '../engine/response-logger';
import { WorkbenchError } from '../shared/errors';
import { formatRecord } from './result-format';

export interface MonitorEntryIo {
  print: (line: string) => void;
  /** Settles when the operator asks to stop monitoring */
  waitForStop: () => Promise<unknown>;
}

/**
 * Returns false when the monitor could not start, e.g. on an unbound variable.
 * The failure is printed and the operator's session goes on.
 */
export async function runMonitorEntry(
  session: ProjectSession,
  definition: SocketRequestDefinition,
  io: MonitorEntryIo,
): Promise<boolean> {
  const display = new CallbackSink('terminal', (record: LogRecord) => {
    if (record.kind !== 'http') io.print(formatRecord(record));
  });
  session.responseLogger.addSink(display);

  try {
    try {
      session.startMonitor(definition);
    } catch (err: unknown) {
      if (!(err instanceof WorkbenchError)) throw err;
      io.print(`Could not start ${definition.desc}: ${err.message}`);
      return false;
    }

    await io.waitForStop();
    return true;
  } finally {
    session.stopMonitors();
    session.responseLogger.removeSink(display);
  }
}
