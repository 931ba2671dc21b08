import { randomUUID } from 'node:crypto';
import { pino, type DestinationStream, type Logger as PinoLogger, type LoggerOptions } from 'pino';

/**
 * Log context that can be attached to log entries for correlation and filtering.
 */
export interface LogContext {
  /** Unique identifier for the harvesting run */
  runId?: string;
  /** Ordinal of the scan batch within the run */
  batchId?: string;
  /** Server-side scan job identifier */
  scanId?: string;
  workspaceId?: string;
  datasetId?: string;
  /** Service/component name */
  service?: string;
  /** Component within a service */
  component?: string;
  /** Allow additional string keys for flexibility */
  [key: string]: string | undefined;
}

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, error?: Error | unknown, data?: Record<string, unknown>): void;
  fatal(msg: string, error?: Error | unknown, data?: Record<string, unknown>): void;

  /**
   * Create a child logger with additional context.
   * The context is merged with parent context and included in all log entries.
   */
  child(context: LogContext): Logger;

  getContext(): LogContext;
}

/**
 * Wrapper around pino that provides context-aware logging
 */
class ContextLogger implements Logger {
  private pino: PinoLogger;
  private context: LogContext;

  constructor(pinoInstance: PinoLogger, context: LogContext = {}) {
    this.pino = pinoInstance;
    this.context = context;
  }

  // Context is already bound on the pino child; only per-call data goes here
  private formatData(data?: Record<string, unknown>): Record<string, unknown> {
    return { ...data };
  }

  private formatError(error?: Error | unknown): Record<string, unknown> {
    if (!error) return {};
    if (error instanceof Error) {
      const stackLines = error.stack?.split('\n') ?? [];
      const truncatedStack = stackLines.slice(0, 6).join('\n');

      return {
        err: {
          type: error.name,
          message: error.message,
          stack: truncatedStack,
        },
      };
    }
    return { err: String(error) };
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.pino.debug(this.formatData(data), msg);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.pino.info(this.formatData(data), msg);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.pino.warn(this.formatData(data), msg);
  }

  error(msg: string, error?: Error | unknown, data?: Record<string, unknown>): void {
    this.pino.error({ ...this.formatData(data), ...this.formatError(error) }, msg);
  }

  fatal(msg: string, error?: Error | unknown, data?: Record<string, unknown>): void {
    this.pino.fatal({ ...this.formatData(data), ...this.formatError(error) }, msg);
  }

  child(context: LogContext): Logger {
    const mergedContext = { ...this.context, ...context };
    const childPino = this.pino.child(context);
    return new ContextLogger(childPino, mergedContext);
  }

  getContext(): LogContext {
    return { ...this.context };
  }
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface CreateLoggerOptions {
  /** Service name to include in all log entries */
  service: string;
  /** Log level (default: LOG_LEVEL env, then 'info') */
  level?: LogLevel;
  /** Force pretty printing regardless of environment */
  pretty?: boolean;
  /** Additional context to include in all log entries */
  context?: LogContext;
  /** Write JSON lines here instead of stdout; disables pretty printing */
  destination?: DestinationStream;
}

/**
 * Pretty output only for a developer at a terminal; piped output stays JSON.
 */
function shouldUsePretty(forceFlag?: boolean): boolean {
  if (forceFlag !== undefined) return forceFlag;
  const nodeEnv = process.env.NODE_ENV;
  return (nodeEnv === 'development' || !nodeEnv) && process.stdout.isTTY === true;
}

function getLogLevel(configLevel?: string): string {
  return configLevel ?? process.env.LOG_LEVEL ?? 'info';
}

function truncate(value: unknown, limit: number): string {
  const str = typeof value === 'string' ? value : JSON.stringify(value) ?? String(value);
  return str.length > limit ? str.slice(0, limit) + '...[truncated]' : str;
}

/**
 * Create a new logger instance with the specified configuration.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ service: 'scanner' });
 * logger.info('Starting run');
 *
 * const log = logger.child({ runId: '123', batchId: '2' });
 * log.info('Submitting scan'); // includes runId and batchId
 * ```
 */
export function createLogger(options: CreateLoggerOptions): Logger {
  const usePretty = !options.destination && shouldUsePretty(options.pretty);
  const level = getLogLevel(options.level);

  const pinoOptions: LoggerOptions = {
    level,
    base: {
      service: options.service,
      pid: process.pid,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    // Scan payloads run to megabytes; never log them whole
    serializers: {
      // formatError already shaped it; pino's default would rename the type
      err: (value: unknown) => value,
      payload: (value: unknown) => truncate(value, 1024),
      response: (value: unknown) => truncate(value, 2048),
    },
  };

  if (usePretty) {
    pinoOptions.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        messageFormat: '{service} | {msg}',
      },
    };
  }

  const root = options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
  const context = options.context ?? {};
  return new ContextLogger(Object.keys(context).length > 0 ? root.child(context) : root, context);
}

export function generateRunId(): string {
  return randomUUID();
}

/**
 * No-op logger for testing or when logging should be disabled
 */
export const nullLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  fatal: () => {},
  child: () => nullLogger,
  getContext: () => ({}),
};

/**
 * Cap error messages to a maximum length before they land in run statistics.
 */
export function capErrorMessage(message: string, maxLength = 1000): string {
  if (message.length <= maxLength) return message;
  return message.substring(0, maxLength) + '... (truncated)';
}
