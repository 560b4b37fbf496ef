/**
 * MockMonitorSocket - in-process stand-in for a Socket.IO connection.
 * Tests drive the server side with the simulate* methods.
 */

import type { MonitorSocket, MonitorSocketFactory, MonitorSocketOptions } from '../engine/socket-monitor';

export interface EmittedMessage {
  event: string;
  data: unknown;
}

export class MockMonitorSocket implements MonitorSocket {
  opened = false;
  closed = false;
  readonly emitted: EmittedMessage[] = [];

  private connectHandlers: Array<() => void> = [];
  private disconnectHandlers: Array<(reason: string) => void> = [];
  private connectErrorHandlers: Array<(error: Error) => void> = [];
  private anyHandlers: Array<(event: string, args: unknown[]) => void> = [];
  private pendingAcks: Array<(...response: unknown[]) => void> = [];

  constructor(readonly url: string, readonly options: MonitorSocketOptions) {}

  onConnect(handler: () => void): void {
    this.connectHandlers.push(handler);
  }

  onDisconnect(handler: (reason: string) => void): void {
    this.disconnectHandlers.push(handler);
  }

  onConnectError(handler: (error: Error) => void): void {
    this.connectErrorHandlers.push(handler);
  }

  onAnyEvent(handler: (event: string, args: unknown[]) => void): void {
    this.anyHandlers.push(handler);
  }

  emit(event: string, data: unknown, ack: (...response: unknown[]) => void): void {
    this.emitted.push({ event, data });
    this.pendingAcks.push(ack);
  }

  open(): void {
    this.opened = true;
  }

  close(): void {
    this.closed = true;
  }

  // ---------------------------------------------------------------------------
  // Server side
  // ---------------------------------------------------------------------------

  simulateConnect(): void {
    this.connectHandlers.forEach(handler => handler());
  }

  simulateEvent(event: string, ...args: unknown[]): void {
    this.anyHandlers.forEach(handler => handler(event, args));
  }

  simulateDisconnect(reason = 'transport close'): void {
    this.disconnectHandlers.forEach(handler => handler(reason));
  }

  simulateConnectError(message = 'xhr poll error'): void {
    const error = new Error(message);
    this.connectErrorHandlers.forEach(handler => handler(error));
  }

  /** Answer the oldest emit that is still waiting for its acknowledgement */
  acknowledge(...response: unknown[]): void {
    const ack = this.pendingAcks.shift();
    if (!ack) {
      throw new Error('No emit is waiting for an acknowledgement');
    }
    ack(...response);
  }
}

/**
 * Hands out MockMonitorSockets and remembers them in creation order.
 */
export class MockSocketFactory {
  readonly sockets: MockMonitorSocket[] = [];

  readonly create: MonitorSocketFactory = (url, options) => {
    const socket = new MockMonitorSocket(url, options);
    this.sockets.push(socket);
    return socket;
  };

  latest(): MockMonitorSocket {
    const socket = this.sockets[this.sockets.length - 1];
    if (!socket) {
      throw new Error('No socket has been created');
    }
    return socket;
  }
}
