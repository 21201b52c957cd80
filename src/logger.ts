/**
 * Logger abstraction.
 *
 * Structured, level-based logging with persistent context. Every component
 * takes a child logger (`logger.child({ component: 'task-poller' })`), and
 * work on one resource or task narrows it further with `forResource()` and
 * `forTask()` so every line carries the same correlation fields.
 * Context keys that look like secrets are redacted before any sink sees them.
 * Consumers can replace the default sink by calling setLogHandler().
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

/** Correlation fields shared by every component's log lines. */
export interface LogContext {
  component?: string;
  driverId?: string;
  resourceId?: string;
  orderId?: string;
  taskId?: string;
  action?: string;
  [key: string]: unknown;
}

export const REDACTED_LOG_VALUE = '[REDACTED]';
const SECRET_CONTEXT_KEY = /(secret|password|token|api[-_]?key|authorization|signature)/i;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

/** Default log handler writes one JSON line per entry. */
const defaultLogHandler: LogHandler = (entry: LogEntry) => {
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

let currentHandler: LogHandler = defaultLogHandler;
let currentMinLevel: LogLevel = LogLevel.Info;

/** Replace the log sink (tests, external log shippers). */
export function setLogHandler(handler: LogHandler): void {
  currentHandler = handler;
}

/** Restore the JSON console sink. */
export function resetLogHandler(): void {
  currentHandler = defaultLogHandler;
}

/** Set the minimum log level. Messages below this level are suppressed. */
export function setLogLevel(level: LogLevel): void {
  currentMinLevel = level;
}

/** Parse a level name, returning undefined for anything unknown. */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  return Object.values(LogLevel).find((level) => level === normalized);
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[currentMinLevel];
}

/** Shallow redaction: nested values are the caller's to keep clean. */
export function redactLogContext(context: LogContext): LogContext {
  const result: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    result[key] = SECRET_CONTEXT_KEY.test(key) && value !== undefined ? REDACTED_LOG_VALUE : value;
  }
  return result;
}

function log(level: LogLevel, message: string, context: LogContext): void {
  if (!shouldLog(level)) return;
  currentHandler({
    level,
    message,
    context: redactLogContext(context),
    timestamp: new Date().toISOString(),
  });
}

/** Create a logger with persistent context fields. */
export function createLogger(baseContext: LogContext = {}): Logger {
  const child = (childCtx: LogContext): Logger => createLogger({ ...baseContext, ...childCtx });
  return {
    debug: (msg, ctx) => log(LogLevel.Debug, msg, { ...baseContext, ...ctx }),
    info: (msg, ctx) => log(LogLevel.Info, msg, { ...baseContext, ...ctx }),
    warn: (msg, ctx) => log(LogLevel.Warn, msg, { ...baseContext, ...ctx }),
    error: (msg, ctx) => log(LogLevel.Error, msg, { ...baseContext, ...ctx }),
    child,
    forResource: (resource) => child({ resourceId: resource.id, orderId: resource.orderId, driverId: resource.driverId }),
    forTask: (task) => child({ taskId: task.id, resourceId: task.resourceId, action: task.action }),
  };
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(context: LogContext): Logger;
  /** Child logger tagged with a resource's id, order and driver. */
  forResource(resource: { id: string; orderId: string; driverId: string }): Logger;
  /** Child logger tagged with a task's id, resource and action. */
  forTask(task: { id: string; resourceId: string; action: string }): Logger;
}

/** Root logger instance. */
export const logger = createLogger({ service: 'provision-orchestrator' });
