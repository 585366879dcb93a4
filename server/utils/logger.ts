/**
 * Structured Logging System
 *
 * Provides consistent, structured logging with log levels, context, and metadata.
 * Output goes through winston: JSON entries with a readable console line.
 */

import winston from 'winston';
import { LOGGING } from './constants';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'crit';
export type LogMetadata = Record<string, unknown>;

const LOG_LEVELS: Record<LogLevel, number> = {
  crit: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export function resolveLevel(value: string | undefined): LogLevel {
  return value && isLogLevel(value) ? value : LOGGING.DEFAULT_LEVEL;
}

const winstonLogger = winston.createLogger({
  levels: LOG_LEVELS,
  level: resolveLevel(process.env.LOG_LEVEL),
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  transports: [
    new winston.transports.Console({
      silent: !LOGGING.ENABLE_CONSOLE,
      format: winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
        winston.format.printf(({ timestamp, level, message, context, ...meta }) => {
          const scope = context ? `[${String(context)}]` : '';
          const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
          return `${String(timestamp)} ${level.toUpperCase().padEnd(5)} ${scope} ${String(message)}${metaStr}`;
        })
      ),
    }),
  ],
});

function describeError(error: unknown): LogMetadata {
  if (error instanceof Error) {
    return { error: error.message, stack: error.stack };
  }
  if (error === undefined) {
    return {};
  }
  return { error: String(error) };
}

// ============================================================================
// LOGGER CLASS
// ============================================================================

export class Logger {
  private readonly context: string;

  constructor(context: string = 'App') {
    this.context = context;
  }

  /**
   * Create a child logger with a specific context
   */
  child(context: string): Logger {
    return new Logger(`${this.context}:${context}`);
  }

  /**
   * Set minimum log level for every logger
   */
  setLevel(level: LogLevel): void {
    winstonLogger.level = level;
  }

  private write(level: LogLevel, message: string, metadata?: LogMetadata): void {
    winstonLogger.log(level, message, { context: this.context, ...metadata });
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.write('warn', message, metadata);
  }

  error(message: string, error?: unknown, metadata?: LogMetadata): void {
    this.write('error', message, { ...metadata, ...describeError(error) });
  }

  critical(message: string, error?: unknown, metadata?: LogMetadata): void {
    this.write('crit', message, { ...metadata, ...describeError(error) });
  }

  /**
   * Log order event
   */
  order(action: string, instrument: string, side: string, details: LogMetadata): void {
    this.info(`Order ${action}: ${side} ${instrument}`, {
      action,
      instrument,
      side,
      ...details,
    });
  }

  /**
   * Log signal event
   */
  signal(instrument: string, direction: string, confidence: number, details?: LogMetadata): void {
    this.info(`Signal: ${direction} ${instrument} (${(confidence * 100).toFixed(1)}%)`, {
      instrument,
      direction,
      confidence,
      ...details,
    });
  }
}

// ============================================================================
// GLOBAL LOGGER INSTANCES
// ============================================================================

export const logger = new Logger('FxBot');

// Pre-configured loggers for different components
export const loggers = {
  app: logger.child('App'),
  scheduler: logger.child('Scheduler'),
  supervisor: logger.child('Supervisor'),
  health: logger.child('HealthCheck'),
  signal: logger.child('SignalAggregator'),
  risk: logger.child('RiskGate'),
  execution: logger.child('TradeExecutor'),
  state: logger.child('StateStore'),
  market: logger.child('MarketData'),
  sentiment: logger.child('NewsSentiment'),
  telegram: logger.child('Telegram'),
  commands: logger.child('Commands'),
};

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Format duration in milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(2)}s`;
  if (ms < 3600000) return `${(ms / 60000).toFixed(2)}m`;
  return `${(ms / 3600000).toFixed(2)}h`;
}

/**
 * Create a timer for measuring operation duration
 */
export function createTimer() {
  const start = Date.now();
  return {
    elapsed: () => Date.now() - start,
    log: (target: Logger, message: string) => {
      target.debug(`${message} - ${formatDuration(Date.now() - start)}`);
    },
  };
}
