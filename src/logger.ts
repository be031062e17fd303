import { pino, type Logger, type LevelWithSilent } from 'pino';

/**
 * Logger options
 */
export interface LoggerOptions {
  /** Minimum level; defaults to silent so the package stays quiet unless asked */
  level?: LevelWithSilent;
  /** Extra bindings for every entry */
  bindings?: Record<string, unknown>;
}

/**
 * Structured logger using pino
 *
 * ISO timestamps, level as a label, JSON output.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const base = pino({
    name: 'double-int',
    level: options.level ?? 'silent',
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
  return options.bindings ? base.child(options.bindings) : base;
}

/** Package-wide default, used when callers pass no logger */
export const defaultLogger = createLogger();
