/**
 * @fileoverview Logging infrastructure for Trellis
 *
 * Uses pino for structured logging with:
 * - Configurable log levels
 * - JSON output on stderr by default
 * - Pretty printing on request
 * - Component child loggers
 * - Performance tracking
 */

import { pino } from 'pino';

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
  'silent',
];

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  pretty?: boolean;
}

export interface LogContext {
  component?: string;
  [key: string]: unknown;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

// =============================================================================
// Logger Factory
// =============================================================================

/**
 * Create a configured pino logger instance
 */
function createPinoLogger(options: LoggerOptions = {}): pino.Logger {
  // Quiet by default: a library should not chatter into its host's stderr.
  // Use LOG_LEVEL=debug for verbose output.
  const envLevel = process.env.LOG_LEVEL;
  const level = options.level ?? (isLogLevel(envLevel) ? envLevel : 'warn');
  const pretty = options.pretty ?? false;

  const pinoOptions: pino.LoggerOptions = {
    level,
    name: options.name ?? 'trellis',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
      bindings: (bindings) => ({
        pid: bindings.pid,
        host: bindings.hostname,
        name: bindings.name,
      }),
    },
  };

  if (pretty) {
    return pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino(pinoOptions, pino.destination(2));
}

// =============================================================================
// Logger Wrapper Class
// =============================================================================

export class TrellisLogger {
  private pino: pino.Logger;
  private readonly context: LogContext;

  constructor(options: LoggerOptions = {}, context: LogContext = {}, instance?: pino.Logger) {
    this.pino = instance ?? createPinoLogger(options);
    this.context = context;
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): TrellisLogger {
    return new TrellisLogger({}, { ...this.context, ...context }, this.pino.child(context));
  }

  get level(): string {
    return this.pino.level;
  }

  getContext(): LogContext {
    return this.context;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level !== 'silent' && this.pino.isLevelEnabled(level);
  }

  trace(msg: string, data?: Record<string, unknown>): void {
    this.pino.trace(data ?? {}, msg);
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.pino.debug(data ?? {}, msg);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.pino.info(data ?? {}, msg);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.pino.warn(data ?? {}, msg);
  }

  error(msg: string, error?: unknown): void {
    if (error instanceof Error) {
      this.pino.error({ err: error }, msg);
    } else if (isRecord(error)) {
      this.pino.error(error, msg);
    } else {
      this.pino.error({ err: error }, msg);
    }
  }

  /**
   * Start a timer for performance tracking
   */
  startTimer(label: string): () => void {
    const start = performance.now();
    return () => {
      const duration = performance.now() - start;
      this.debug(`${label} completed`, { durationMs: duration.toFixed(2) });
    };
  }

  /**
   * Log with timing wrapper
   */
  async timed<T>(label: string, fn: () => Promise<T>): Promise<T> {
    const start = performance.now();
    try {
      const result = await fn();
      const duration = performance.now() - start;
      this.debug(`${label} completed`, { durationMs: duration.toFixed(2) });
      return result;
    } catch (error) {
      const duration = performance.now() - start;
      this.debug(`${label} failed`, {
        durationMs: duration.toFixed(2),
        err: error instanceof Error ? error : new Error(String(error)),
      });
      throw error;
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// =============================================================================
// Singleton Logger
// =============================================================================

let defaultLogger: TrellisLogger | null = null;

/**
 * Get the default logger instance
 */
export function getLogger(options?: LoggerOptions): TrellisLogger {
  if (!defaultLogger) {
    defaultLogger = new TrellisLogger(options);
  }
  return defaultLogger;
}

/**
 * Create a component-specific logger
 */
export function createLogger(component: string, context?: LogContext): TrellisLogger {
  return getLogger().child({ component, ...context });
}

/**
 * Replace the default logger. Loggers created before the call keep their
 * old configuration.
 */
export function configureLogging(options: LoggerOptions): TrellisLogger {
  defaultLogger = new TrellisLogger(options);
  return defaultLogger;
}

/**
 * Reset the default logger (for testing)
 */
export function resetLogger(): void {
  defaultLogger = null;
}
