/**
 * Structured logger for the updater function.
 *
 * Writes one JSON object per line so CloudWatch Logs Insights can query the
 * fields. The minimum level is read from LOG_LEVEL when a logger is created.
 */

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error'
}

export interface LogEntry {
  level: LogLevel;
  scope: string;
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
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3
};

const defaultLogHandler: LogHandler = (entry: LogEntry) => {
  const line = JSON.stringify({
    level: entry.level,
    ts: entry.timestamp,
    scope: entry.scope,
    msg: entry.message,
    ...entry.context
  });
  if (entry.level === LogLevel.Error) {
    console.error(line);
  } else if (entry.level === LogLevel.Warn) {
    console.warn(line);
  } else {
    console.log(line);
  }
};

let currentHandler: LogHandler = defaultLogHandler;

/** Replace the log handler (tests, or forwarding to another sink). */
export function setLogHandler(handler: LogHandler): void {
  currentHandler = handler;
}

export function resetLogHandler(): void {
  currentHandler = defaultLogHandler;
}

export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.toLowerCase()) {
    case 'debug':
      return LogLevel.Debug;
    case 'warn':
    case 'warning':
      return LogLevel.Warn;
    case 'error':
      return LogLevel.Error;
    default:
      return LogLevel.Info;
  }
}

export function createLogger(scope: string, minLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL)): Logger {
  const log = (level: LogLevel, message: string, context?: Record<string, unknown>): void => {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[minLevel]) {
      return;
    }
    currentHandler({ level, scope, message, context, timestamp: new Date().toISOString() });
  };

  return {
    debug: (message, context) => log(LogLevel.Debug, message, context),
    info: (message, context) => log(LogLevel.Info, message, context),
    warn: (message, context) => log(LogLevel.Warn, message, context),
    error: (message, context) => log(LogLevel.Error, message, context)
  };
}
