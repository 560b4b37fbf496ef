/**
 * SocketMonitor - one long-lived Socket.IO subscription that records every event.
 *
 * States: DISCONNECTED → CONNECTING → CONNECTED → (DISCONNECTED on error | STOPPED on stop()).
 * After an unexpected disconnect or a failed connect it reconnects once; if that fails
 * too it gives up, records the failure and emits 'failed'. It never touches variables
 * and never throws into the host.
 */

import { EventEmitter } from 'events';
import type { LogRecord, MonitorNoticeType, SocketEvent } from '@/shared/types/record-types';
import { config } from '../shared/config';
import { SocketDisconnectedError } from '../shared/errors';
import { toErrorDetail, toErrorMessage } from '../shared/error-utils';
import { createLogger } from '../shared/logger';

const logger = createLogger('SocketMonitor');

export enum MonitorState {
  DISCONNECTED = 'DISCONNECTED',
  CONNECTING = 'CONNECTING',
  CONNECTED = 'CONNECTED',
  STOPPED = 'STOPPED',
}

/** The few socket primitives the monitor needs */
export interface MonitorSocket {
  onConnect(handler: () => void): void;
  onDisconnect(handler: (reason: string) => void): void;
  onConnectError(handler: (error: Error) => void): void;
  /** Every server event, with all of its arguments */
  onAnyEvent(handler: (event: string, args: unknown[]) => void): void;
  emit(event: string, data: unknown, ack: (...response: unknown[]) => void): void;
  open(): void;
  close(): void;
}

export interface MonitorSocketOptions {
  query: Record<string, string>;
  connectTimeoutMs: number;
}

export type MonitorSocketFactory = (url: string, options: MonitorSocketOptions) => MonitorSocket;

/** Anything that accepts records; ResponseLogger in production */
export interface RecordWriter {
  append(record: LogRecord): void;
}

export interface SocketMonitorOptions {
  endpoint: string;
  namespace?: string;
  params?: Record<string, string>;
  /** Emitted after every successful connect; the acknowledgement is recorded */
  emitOnConnect?: { event: string; data: unknown };
  writer: RecordWriter;
  socketFactory: MonitorSocketFactory;
  reconnectDelayMs?: number;
  maxReconnectAttempts?: number;
  connectTimeoutMs?: number;
}

/**
 * `http://host:3000` + `/chat` → `http://host:3000/chat`; the default namespace adds nothing.
 */
export function joinNamespace(endpoint: string, namespace?: string): string {
  if (!namespace || namespace === '/') return endpoint;
  const trimmed = endpoint.replace(/\/+$/, '');
  return `${trimmed}${namespace.startsWith('/') ? namespace : `/${namespace}`}`;
}

export class SocketMonitor extends EventEmitter {
  readonly source: string;

  private state: MonitorState = MonitorState.DISCONNECTED;
  private socket: MonitorSocket | null = null;
  private reconnectAttempts = 0;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private readonly options: SocketMonitorOptions;

  constructor(options: SocketMonitorOptions) {
    super();
    this.options = options;
    this.source = joinNamespace(options.endpoint, options.namespace);
  }

  getState(): MonitorState {
    return this.state;
  }

  start(): void {
    if (this.state === MonitorState.CONNECTING || this.state === MonitorState.CONNECTED) {
      return;
    }
    this.reconnectAttempts = 0;
    this.connect();
  }

  stop(): void {
    if (this.state === MonitorState.STOPPED) {
      return;
    }

    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }

    this.setState(MonitorState.STOPPED);
    this.disposeSocket();
    this.notice('stopped', `Stopped monitoring ${this.source}`);
  }

  private connect(): void {
    this.setState(MonitorState.CONNECTING);
    this.notice('connecting', `Connecting to ${this.source}`);

    const socket = this.options.socketFactory(this.source, {
      query: this.options.params ?? {},
      connectTimeoutMs: this.options.connectTimeoutMs ?? config.socket.connectTimeoutMs,
    });
    this.socket = socket;

    socket.onConnect(() => {
      if (this.socket !== socket) return;
      this.handleConnect(socket);
    });
    socket.onAnyEvent((event, args) => {
      if (this.socket !== socket) return;
      this.recordEvent(event, args);
    });
    socket.onDisconnect((reason) => {
      if (this.socket !== socket || this.state === MonitorState.STOPPED) return;
      this.handleFailure('disconnected', reason);
    });
    socket.onConnectError((error) => {
      if (this.socket !== socket || this.state === MonitorState.STOPPED) return;
      this.handleFailure('connect-failed', toErrorMessage(error));
    });

    socket.open();
  }

  private handleConnect(socket: MonitorSocket): void {
    this.reconnectAttempts = 0;
    this.setState(MonitorState.CONNECTED);
    this.notice('connected', `Connected to ${this.source}`);

    const emitOnConnect = this.options.emitOnConnect;
    if (emitOnConnect) {
      logger.debug(`Emitting ${emitOnConnect.event} on ${this.source}`);
      socket.emit(emitOnConnect.event, emitOnConnect.data, (...response) => {
        if (this.socket !== socket || this.state === MonitorState.STOPPED) return;
        this.recordEvent(`${emitOnConnect.event}:ack`, response);
      });
    }
  }

  private handleFailure(notice: 'disconnected' | 'connect-failed', reason: string): void {
    this.disposeSocket();
    this.setState(MonitorState.DISCONNECTED);

    const error = new SocketDisconnectedError(this.source, reason);
    this.notice(notice, error.message, error);

    const maxAttempts = this.options.maxReconnectAttempts ?? config.socket.maxReconnectAttempts;
    if (this.reconnectAttempts < maxAttempts) {
      this.reconnectAttempts++;
      const delay = this.options.reconnectDelayMs ?? config.socket.reconnectDelayMs;
      this.notice('reconnecting', `Reconnecting to ${this.source} in ${delay}ms (attempt ${this.reconnectAttempts}/${maxAttempts})`);
      this.reconnectTimer = setTimeout(() => {
        this.reconnectTimer = null;
        if (this.state !== MonitorState.STOPPED) {
          this.connect();
        }
      }, delay);
      return;
    }

    this.notice('gave-up', `Giving up on ${this.source} after ${maxAttempts} reconnect attempt(s)`, error);
    logger.error(error.message);
    this.emit('failed', error);
  }

  private recordEvent(event: string, args: unknown[]): void {
    const record: SocketEvent = Object.freeze({
      kind: 'socket-event' as const,
      event,
      payload: args.length === 0 ? null : args.length === 1 ? args[0] : args,
      timestamp: new Date().toISOString(),
      source: this.source,
    });
    this.write(record);
  }

  private notice(notice: MonitorNoticeType, message: string, error?: SocketDisconnectedError): void {
    logger.info(message);
    this.write(Object.freeze({
      kind: 'monitor' as const,
      notice,
      message,
      timestamp: new Date().toISOString(),
      source: this.source,
      ...(error ? { error: toErrorDetail(error, error.code) } : {}),
    }));
  }

  /** A failing writer is reported but must not break the socket's event loop */
  private write(record: LogRecord): void {
    try {
      this.options.writer.append(record);
    } catch (err: unknown) {
      logger.error(`Failed to record ${record.kind} from ${this.source}: ${toErrorMessage(err)}`);
    }
  }

  private setState(state: MonitorState): void {
    if (this.state === state) return;
    this.state = state;
    this.emit('state', state);
  }

  private disposeSocket(): void {
    const socket = this.socket;
    this.socket = null;
    socket?.close();
  }
}
