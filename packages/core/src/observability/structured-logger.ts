/**
 * Structured Logger
 *
 * One JSON object per line in production, a coloured single line in
 * development. Child loggers carry trace and request ids through the
 * bridge; a custom `output` receives the entries instead (tests, shipping
 * to a collector).
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  FATAL = 4,
}

export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  service: string;
  [key: string]: unknown;
}

export type LogContext = Record<string, unknown>;

export interface LoggerOptions {
  service: string;
  /** Entries below this level are discarded */
  level: LogLevel;
  /** Coloured single-line output instead of JSON */
  pretty: boolean;
  /** Merged into every entry; child loggers extend it */
  defaultContext?: LogContext;
  /** Replaces stdout/stderr */
  output?: (entry: LogEntry) => void;
  /** Attach `error.stack` to error entries below FATAL */
  includeStackTrace: boolean;
  /** Clock for entry timestamps and timers, epoch ms */
  now?: () => number;
}

export interface SerializedError {
  name: string;
  message: string;
  stack?: string;
  code?: string;
  cause?: string;
}

const COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '\x1b[36m',
  [LogLevel.INFO]: '\x1b[32m',
  [LogLevel.WARN]: '\x1b[33m',
  [LogLevel.ERROR]: '\x1b[31m',
  [LogLevel.FATAL]: '\x1b[35m',
};
const RESET = '\x1b[0m';

export class StructuredLogger {
  private readonly context: LogContext;
  private readonly now: () => number;

  constructor(private readonly options: LoggerOptions) {
    this.context = { ...options.defaultContext };
    this.now = options.now ?? Date.now;
  }

  child(context: LogContext): StructuredLogger {
    return new StructuredLogger({
      ...this.options,
      defaultContext: { ...this.context, ...context },
    });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level >= this.options.level;
  }

  debug(message: string, context?: LogContext): void {
    this.write(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write(LogLevel.WARN, message, context);
  }

  /**
   * `error` may be the thrown value or plain context when there is none
   */
  error(message: string, error?: Error | LogContext, context?: LogContext): void {
    this.write(LogLevel.ERROR, message, withError(error, context, this.options.includeStackTrace));
  }

  fatal(message: string, error?: Error | LogContext, context?: LogContext): void {
    this.write(LogLevel.FATAL, message, withError(error, context, true));
  }

  /**
   * Start a timer; the returned function logs `<label> completed` with the duration in ms
   */
  time(label: string, context?: LogContext): () => number {
    const start = this.now();
    return () => {
      const duration = this.now() - start;
      this.info(`${label} completed`, { ...context, duration });
      return duration;
    };
  }

  /**
   * One line per HTTP exchange, levelled by status
   */
  request(method: string, path: string, statusCode: number, duration: number, context?: LogContext): void {
    this.write(levelForStatus(statusCode), `${method} ${path} ${statusCode}`, {
      ...context,
      http: { method, path, statusCode },
      duration,
    });
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isLevelEnabled(level)) return;

    // Reserved fields go last so context cannot overwrite them
    const entry: LogEntry = {
      ...this.context,
      ...context,
      timestamp: new Date(this.now()).toISOString(),
      level: LogLevel[level],
      message,
      service: this.options.service,
    };

    if (this.options.output) {
      this.options.output(entry);
      return;
    }

    const line = this.options.pretty ? formatPretty(entry, level) : JSON.stringify(entry);
    const stream = level >= LogLevel.ERROR ? process.stderr : process.stdout;
    stream.write(line + '\n');
  }
}

function levelForStatus(statusCode: number): LogLevel {
  if (statusCode >= 500) return LogLevel.ERROR;
  if (statusCode >= 400) return LogLevel.WARN;
  return LogLevel.INFO;
}

function withError(error: Error | LogContext | undefined, context: LogContext | undefined, includeStack: boolean): LogContext {
  if (error instanceof Error) {
    return { ...context, error: serializeError(error, includeStack) };
  }
  return { ...error, ...context };
}

export function serializeError(error: Error, includeStack: boolean): SerializedError {
  const serialized: SerializedError = {
    name: error.name,
    message: error.message,
    stack: includeStack ? error.stack : undefined,
  };
  if ('code' in error && typeof error.code === 'string') {
    serialized.code = error.code;
  }
  if (error.cause instanceof Error) {
    serialized.cause = error.cause.message;
  }
  return serialized;
}

function formatPretty(entry: LogEntry, level: LogLevel): string {
  const { timestamp, level: levelName, message, service, error, duration, ...rest } = entry;
  const time = timestamp.slice(11, 23);
  const dur = typeof duration === 'number' ? ` (${duration}ms)` : '';
  const ctx = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
  const line = `${COLORS[level]}[${time}] ${levelName.padEnd(5)} ${service}: ${message}${dur}${ctx}${RESET}`;

  const stack = stackOf(error);
  return stack ? `${line}\n  ${stack}` : line;
}

function stackOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'stack' in error && typeof error.stack === 'string') {
    return error.stack;
  }
  return undefined;
}

/**
 * Parse a level name such as "warn" or "DEBUG"
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  switch (value?.trim().toUpperCase()) {
    case 'DEBUG': return LogLevel.DEBUG;
    case 'INFO': return LogLevel.INFO;
    case 'WARN': return LogLevel.WARN;
    case 'ERROR': return LogLevel.ERROR;
    case 'FATAL': return LogLevel.FATAL;
    default: return fallback;
  }
}

/**
 * Logger configured from NODE_ENV and LOG_LEVEL
 */
export function createLogger(options?: Partial<LoggerOptions>): StructuredLogger {
  const production = (process.env.NODE_ENV ?? 'development') === 'production';
  return new StructuredLogger({
    service: 'resilient-bridge',
    level: parseLogLevel(process.env.LOG_LEVEL, production ? LogLevel.INFO : LogLevel.DEBUG),
    pretty: !production,
    includeStackTrace: !production,
    ...options,
  });
}
