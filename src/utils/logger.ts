import type { LogLevel } from '../types/index.js';

// Colors for terminal output
const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  magenta: '\x1b[35m',
};

const LEVELS: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export interface Logger {
  error(message: string, error?: unknown): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

/**
 * Console logger gated by level
 */
export function createLogger(level: LogLevel = 'info', prefix = 'tapedeck'): Logger {
  const threshold = LEVELS[level];
  const tag = (color: string, label: string) =>
    `${colors.dim}[${prefix}]${colors.reset} ${color}${label}${colors.reset}`;

  return {
    error(message, error) {
      if (threshold < LEVELS.error) return;
      if (error !== undefined) {
        console.error(tag(colors.red, 'error'), message, error);
      } else {
        console.error(tag(colors.red, 'error'), message);
      }
    },
    warn(message) {
      if (threshold < LEVELS.warn) return;
      console.warn(tag(colors.yellow, 'warn'), message);
    },
    info(message) {
      if (threshold < LEVELS.info) return;
      console.log(tag(colors.cyan, 'info'), message);
    },
    debug(message) {
      if (threshold < LEVELS.debug) return;
      console.debug(tag(colors.magenta, 'debug'), message);
    },
  };
}

export const silentLogger: Logger = createLogger('silent');
