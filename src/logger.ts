/**
 * Structured logging for the render service.
 *
 * Each entry is written as one JSON line stamped with the service name and
 * the context of the logger that wrote it. A thrown value passed as `err` is
 * expanded into its message, name, code and stack. Level and sink are
 * process-wide: the entry point applies `ServiceConfig.logLevel` through
 * configureLogging(), and tests swap the sink to capture entries.
 */

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: LogContext;
  timestamp: string;
}

export type LogSink = (entry: LogEntry) => void;

const SEVERITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 10,
  [LogLevel.Info]: 20,
  [LogLevel.Warn]: 30,
  [LogLevel.Error]: 40,
};

/** Flatten anything thrown into JSON-safe fields. */
export function describeError(err: unknown): LogContext {
  if (typeof err !== 'object' || err === null || !('message' in err)) {
    return { message: String(err) };
  }
  const fields: LogContext = { message: String(err.message) };
  if ('name' in err && typeof err.name === 'string') fields.name = err.name;
  if ('code' in err && (typeof err.code === 'string' || typeof err.code === 'number')) fields.code = err.code;
  if ('stack' in err && typeof err.stack === 'string') fields.stack = err.stack;
  return fields;
}

/** Render an entry as the single JSON line the console sink prints. */
export function formatEntry(entry: LogEntry): string {
  const { err, ...context } = entry.context;
  return JSON.stringify({
    time: entry.timestamp,
    level: entry.level,
    msg: entry.message,
    ...context,
    ...(err === undefined ? {} : { err: describeError(err) }),
  });
}

// Warnings and errors go to stderr so stdout stays clean for request lines.
const consoleSink: LogSink = (entry) => {
  const line = formatEntry(entry);
  if (SEVERITY[entry.level] >= SEVERITY[LogLevel.Warn]) {
    console.error(line);
  } else {
    console.log(line);
  }
};

const settings: { level: LogLevel; sink: LogSink } = {
  level: LogLevel.Info,
  sink: consoleSink,
};

/**
 * Adjust process-wide logging. A `sink` of null restores console output;
 * omitted fields keep their current value.
 */
export function configureLogging(options: { level?: LogLevel; sink?: LogSink | null }): void {
  if (options.level !== undefined) settings.level = options.level;
  if (options.sink !== undefined) settings.sink = options.sink ?? consoleSink;
}

export class Logger {
  private readonly context: LogContext;

  constructor(context: LogContext = {}) {
    this.context = context;
  }

  /** A logger whose entries also carry `context`. */
  child(context: LogContext): Logger {
    return new Logger({ ...this.context, ...context });
  }

  debug(message: string, context?: LogContext): void {
    this.write(LogLevel.Debug, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write(LogLevel.Info, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write(LogLevel.Warn, message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write(LogLevel.Error, message, context);
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (SEVERITY[level] < SEVERITY[settings.level]) return;
    settings.sink({
      level,
      message,
      context: { ...this.context, ...context },
      timestamp: new Date().toISOString(),
    });
  }
}

/** Root logger; modules log through children tagged with `module`. */
export const logger = new Logger({ service: 'md-render-service' });
