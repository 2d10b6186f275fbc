/**
 * Structured JSON logger for the lookup filters.
 *
 * Uses Pino so log lines stay machine-readable when the automation engine
 * captures stderr/stdout of its plugins.
 */

import pino from 'pino';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

type LogLevel = (typeof LOG_LEVELS)[number];

const KNOWN_LEVELS: ReadonlySet<string> = new Set(LOG_LEVELS);

function isLogLevel(value: string): value is LogLevel {
  return KNOWN_LEVELS.has(value);
}

/**
 * Create and configure a Pino logger instance.
 *
 * Reads LOG_LEVEL from environment variable (supports both lowercase and uppercase).
 * Defaults to 'info' if not specified or not a known level.
 *
 * @param name - Logger name
 * @param level - Optional log level override
 */
export function setupLogger(name: string = 'lookup-filters', level?: string): pino.Logger {
  const requested = (level || process.env.LOG_LEVEL || 'info').toLowerCase();
  const logLevel: LogLevel = isLogLevel(requested) ? requested : 'info';

  return pino({
    name,
    level: logLevel,
    formatters: {
      level: (label) => ({ level: label.toUpperCase() }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
