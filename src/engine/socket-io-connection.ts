/**
 * Socket.IO client adapter for SocketMonitor.
 * Reconnection is disabled on the client; the monitor owns that policy.
 */

import { io } from 'socket.io-client';
import type { MonitorSocket, MonitorSocketFactory } from './socket-monitor';

export const createSocketIoConnection: MonitorSocketFactory = (url, options): MonitorSocket => {
  const socket = io(url, {
    autoConnect: false,
    reconnection: false,
    forceNew: true,
    query: options.query,
    timeout: options.connectTimeoutMs,
  });

  return {
    onConnect: (handler) => {
      socket.on('connect', handler);
    },
    onDisconnect: (handler) => {
      socket.on('disconnect', (reason) => handler(reason));
    },
    onConnectError: (handler) => {
      socket.on('connect_error', (err) => handler(err));
    },
    onAnyEvent: (handler) => {
      socket.onAny((event: string, ...args: unknown[]) => handler(event, args));
    },
    emit: (event, data, ack) => {
      socket.emit(event, data, ack);
    },
    open: () => {
      socket.connect();
    },
    close: () => {
      socket.removeAllListeners();
      socket.offAny();
      socket.disconnect();
    },
  };
};
