/**
 * Centralized configuration for the workbench
 *
 * Reads environment variables with defaults. Nothing else in the code base
 * should read process.env directly.
 */

function readNumber(raw: string | undefined, fallback: number): number {
  const value = Number(raw);
  return raw !== undefined && raw !== '' && Number.isFinite(value) ? value : fallback;
}

function readFlag(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw === '') return fallback;
  return !['0', 'false', 'no', 'off'].includes(raw.toLowerCase());
}

export const config = {
  /**
   * Project discovery
   */
  projects: {
    rootDir: process.env.PROJECTS_DIR || '.',
    fileName: 'project.json',
  },

  /**
   * Outgoing HTTP requests
   */
  http: {
    // 0 disables the timeout; requests then wait until the server answers or the operator cancels
    timeoutMs: readNumber(process.env.HTTP_TIMEOUT_MS, 0),
  },

  /**
   * Socket.IO monitors
   */
  socket: {
    connectTimeoutMs: readNumber(process.env.SOCKET_CONNECT_TIMEOUT_MS, 20000),
    reconnectDelayMs: readNumber(process.env.SOCKET_RECONNECT_DELAY_MS, 1000),
    // One automatic attempt per unexpected disconnection
    maxReconnectAttempts: 1,
  },

  /**
   * Record output
   */
  output: {
    logFileName: 'log.jsonl',
    archiveExchanges: readFlag(process.env.ARCHIVE_EXCHANGES, true),
    persistVariables: readFlag(process.env.PERSIST_VARIABLES, false),
  },

  /**
   * Logging
   */
  logging: {
    // Levels: 'debug' | 'info' | 'warn' | 'error'
    level: process.env.LOG_LEVEL || 'info',
    colorize: process.env.NODE_ENV !== 'production' && process.env.NO_COLOR === undefined,
  },
};

/**
 * Type-safe access to config
 */
export type Config = typeof config;
