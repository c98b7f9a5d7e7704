// ─────────────────────────────────────────────────────────────────────────────
// Scoped logger: levels, module tag, pluggable transport, in-memory ring buffer
// ─────────────────────────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  message: string;
  module: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const LOG_LEVELS: readonly string[] = Object.keys(LOG_LEVEL_PRIORITY);

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

let globalMinLevel: LogLevel = 'info';
let consoleEnabled = true;

/** Set the minimum log level. Messages below this level are suppressed. */
export function setLogLevel(level: LogLevel): void {
  globalMinLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalMinLevel;
}

/** Turn console output on or off; the buffer and transport still receive entries. */
export function setConsoleOutput(enabled: boolean): void {
  consoleEnabled = enabled;
}

// ── Pluggable transport ──────────────────────────────────────────────────

/** A transport receives every log entry that passes the level filter. */
export type LogTransport = (entry: LogEntry, formatted: string) => void;

let transport: LogTransport | null = null;

/** Only one transport is supported; later calls replace the previous one. */
export function setLogTransport(next: LogTransport | null): void {
  transport = next;
}

/** Format a log entry into a single line. */
export function formatLogEntry(entry: LogEntry): string {
  const dataStr = entry.data ? ` ${JSON.stringify(entry.data)}` : '';
  return `[${entry.timestamp}] [${entry.level.toUpperCase().padEnd(5)}] [${entry.module}] ${entry.message}${dataStr}`;
}

/**
 * Create a scoped logger for a module.
 *
 * ```ts
 * const log = createLogger('scheduler');
 * log.info('Run started', { flow: 'support' });
 * ```
 */
export function createLogger(module: string): Logger {
  function emit(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[globalMinLevel]) return;

    const entry: LogEntry = {
      level,
      message,
      module,
      timestamp: new Date().toISOString(),
      ...(data ? { data } : {}),
    };
    const formatted = formatLogEntry(entry);

    // stdout belongs to flow output; diagnostics go to stderr
    if (consoleEnabled) {
      console.error(formatted);
    }

    pushToBuffer(entry);

    if (transport) {
      try {
        transport(entry, formatted);
      } catch (err) {
        console.error(`[logger] transport failed: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }

  return {
    debug: (message, data) => emit('debug', message, data),
    info: (message, data) => emit('info', message, data),
    warn: (message, data) => emit('warn', message, data),
    error: (message, data) => emit('error', message, data),
  };
}

// ── In-memory ring buffer ────────────────────────────────────────────────

const MAX_BUFFER_SIZE = 500;
const logBuffer: LogEntry[] = [];

function pushToBuffer(entry: LogEntry): void {
  logBuffer.push(entry);
  if (logBuffer.length > MAX_BUFFER_SIZE) {
    logBuffer.shift();
  }
}

/** Recent log entries, oldest first. */
export function getRecentLogs(count = 50): readonly LogEntry[] {
  return logBuffer.slice(-count);
}

export function clearLogBuffer(): void {
  logBuffer.length = 0;
}
