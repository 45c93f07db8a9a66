/**
 * Leveled structured logging.
 *
 * Every entry is written as one JSON line to the console. Tests swap the
 * handler with setLogHandler() to capture entries.
 */

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

const consoleLogHandler: LogHandler = (entry) => {
  const line = JSON.stringify({
    level: entry.level,
    ts: entry.timestamp,
    msg: entry.message,
    ...entry.context,
  });
  switch (entry.level) {
    case LogLevel.Error:
      console.error(line);
      break;
    case LogLevel.Warn:
      console.warn(line);
      break;
    default:
      console.log(line);
  }
};

let currentHandler: LogHandler = consoleLogHandler;
let currentMinLevel: LogLevel = LogLevel.Info;

export function setLogHandler(handler: LogHandler): void {
  currentHandler = handler;
}

/** Restores the console handler after setLogHandler(). */
export function resetLogHandler(): void {
  currentHandler = consoleLogHandler;
}

export function setLogLevel(level: LogLevel): void {
  currentMinLevel = level;
}

function log(level: LogLevel, message: string, context: Record<string, unknown>): void {
  if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[currentMinLevel]) return;
  currentHandler({
    level,
    message,
    context: Object.keys(context).length > 0 ? context : undefined,
    timestamp: new Date().toISOString(),
  });
}

/** Create a logger whose entries always carry the given context fields. */
export function createLogger(baseContext: Record<string, unknown> = {}): Logger {
  return {
    debug: (msg, ctx) => log(LogLevel.Debug, msg, { ...baseContext, ...ctx }),
    info: (msg, ctx) => log(LogLevel.Info, msg, { ...baseContext, ...ctx }),
    warn: (msg, ctx) => log(LogLevel.Warn, msg, { ...baseContext, ...ctx }),
    error: (msg, ctx) => log(LogLevel.Error, msg, { ...baseContext, ...ctx }),
    child: (childCtx) => createLogger({ ...baseContext, ...childCtx }),
  };
}

/** Turn a caught value into loggable fields without dumping command output. */
export function errorContext(err: unknown): Record<string, unknown> {
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return { error: err.message, errorName: 'name' in err ? err.name : undefined };
  }
  return { error: String(err) };
}

export const logger = createLogger();
