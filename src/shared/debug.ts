import { isDebugEnabled } from './config.js';

/**
 * Internal cached state for debug mode.
 * Resolved on first call and never changes (debug mode is process-lifetime).
 */
let _enabled: boolean | null = null;

function enabled(): boolean {
  if (_enabled === null) {
    _enabled = isDebugEnabled();
  }
  return _enabled;
}

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

/**
 * Leveled logger handed to the streaming core.
 *
 * The core only ever calls these methods; where the lines end up (or whether
 * they go anywhere) is the implementation's business.
 */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

function write(level: LogLevel, category: string, message: string, data?: Record<string, unknown>): void {
  const timestamp = new Date().toISOString();
  let line = `[${timestamp}] [LENGTH-GATE:${category}] ${level} ${message}`;
  if (data !== undefined) {
    line += ` ${JSON.stringify(data)}`;
  }
  process.stderr.write(line + '\n');
}

/**
 * Logs a debug message to stderr when debug mode is active.
 *
 * Format: `[ISO_TIMESTAMP] [LENGTH-GATE:category] DEBUG message {json_data}`
 *
 * @param category - Debug category (e.g., 'stream', 'pool', 'http')
 * @param data - Optional structured data (keep lightweight -- never whole texts)
 */
export function debug(
  category: string,
  message: string,
  data?: Record<string, unknown>,
): void {
  if (!enabled()) {
    return;
  }
  write('DEBUG', category, message, data);
}

/**
 * Creates a stderr logger bound to a category.
 *
 * DEBUG and INFO lines follow the debug switch; WARN and ERROR are always written.
 */
export function createLogger(category: string): Logger {
  return {
    debug(message, data) {
      if (enabled()) write('DEBUG', category, message, data);
    },
    info(message, data) {
      if (enabled()) write('INFO', category, message, data);
    },
    warn(message, data) {
      write('WARN', category, message, data);
    },
    error(message, data) {
      write('ERROR', category, message, data);
    },
  };
}

/** Logger that drops everything. */
export const noopLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
