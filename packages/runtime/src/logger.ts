// Structured logging for the engine host
//
// Messages are fixed strings ("Engine created", "Training failed",
// "Mirror log has torn writes"); the engine id and other specifics go in
// `data` so a log pipeline can filter on them.

/**
 * Logger handed to the administrator, router, training orchestrator and
 * mirror log. Every entry about one engine carries `engineId` in `data`.
 */
export type EngineLogger = {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
};

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Writes to the console with a level tag, e.g.
 * `[WARN] Mirror log has torn writes { engineId: 'reco-1', ... }`.
 * The API host writes through it at its `LOG_LEVEL`.
 */
export const consoleLogger: EngineLogger = {
  debug(message: string, data?: Record<string, unknown>) {
    console.debug(`[DEBUG] ${message}`, data ?? '');
  },
  info(message: string, data?: Record<string, unknown>) {
    console.info(`[INFO] ${message}`, data ?? '');
  },
  warn(message: string, data?: Record<string, unknown>) {
    console.warn(`[WARN] ${message}`, data ?? '');
  },
  error(message: string, data?: Record<string, unknown>) {
    console.error(`[ERROR] ${message}`, data ?? '');
  },
};

/**
 * Discards everything. The host and each of its components fall back to it
 * when given no logger.
 */
export const silentLogger: EngineLogger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/**
 * Drop messages below `minLevel` before they reach `base`. Backs the
 * `LOG_LEVEL` setting: at `warn`, engine debug output and lifecycle info
 * are hidden while training failures still come through.
 */
export function createLevelLogger(base: EngineLogger, minLevel: LogLevel): EngineLogger {
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];

  return {
    debug(message, data) {
      if (enabled('debug')) base.debug(message, data);
    },
    info(message, data) {
      if (enabled('info')) base.info(message, data);
    },
    warn(message, data) {
      if (enabled('warn')) base.warn(message, data);
    },
    error(message, data) {
      if (enabled('error')) base.error(message, data);
    },
  };
}

export type LogEntry = {
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
  timestamp: string;
};

/**
 * Keeps entries in memory so tests can assert that a lifecycle step, a
 * failed training run or a torn mirror write was reported.
 */
export function createCapturingLogger(): EngineLogger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];

  const log = (level: LogLevel) => (message: string, data?: Record<string, unknown>) => {
    entries.push({
      level,
      message,
      data,
      timestamp: new Date().toISOString(),
    });
  };

  return {
    entries,
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  };
}
