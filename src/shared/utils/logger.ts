/**
 * Structured JSON logger.
 *
 * Uses Pino for JSON logging on stdout, which both the CLI and the
 * Lambda runtime (CloudWatch) consume.
 */

import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

// Loggers are created at module load; --quiet has to reach them afterwards.
// Keyed by name: a later logger with the same name replaces the earlier one.
const activeLoggers = new Map<string, pino.Logger>();
let levelOverride: LogLevel | undefined;

function toLogLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.toLowerCase();
  return LOG_LEVELS.find((candidate) => candidate === normalized);
}

/**
 * Create and configure a Pino logger instance.
 *
 * Reads LOG_LEVEL from the environment (case-insensitive) when no level
 * is passed. Unknown values fall back to 'info'.
 *
 * @param name - Logger name, conventionally `cost-inventory:<module>`
 * @param level - Optional log level override
 */
export function setupLogger(name: string = 'cost-inventory', level?: string): pino.Logger {
  const logLevel: LogLevel =
    levelOverride ?? toLogLevel(level) ?? toLogLevel(process.env.LOG_LEVEL) ?? 'info';

  const logger = pino({
    name,
    level: logLevel,
    formatters: {
      level: (label) => ({ level: label.toUpperCase() }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });

  activeLoggers.set(name, logger);
  return logger;
}

/**
 * Apply a level to every logger created so far and to those created later.
 * Pass undefined to stop overriding new loggers.
 */
export function setGlobalLogLevel(level: LogLevel | undefined): void {
  levelOverride = level;
  if (!level) {
    return;
  }
  for (const logger of activeLoggers.values()) {
    logger.level = level;
  }
}

/**
 * Number of loggers that `setGlobalLogLevel` currently reaches.
 */
export function activeLoggerCount(): number {
  return activeLoggers.size;
}
