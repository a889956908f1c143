/**
 * Leveled diagnostics sink
 *
 * Debug messages are thunks so that building the text costs nothing when
 * the level filters them out. Components receive a logger through their
 * constructor; there is no module-level logger.
 */

export interface Logger {
  /** Highest debug level that is emitted; 0 disables debug output */
  readonly level: number;
  debug(level: number, message: () => string): void;
  info(message: string): void;
  warn(message: string): void;
}

export interface ConsoleLoggerOptions {
  prefix?: string;
  level?: number;
}

const DEFAULT_CONSOLE_LOGGER_OPTIONS: Required<ConsoleLoggerOptions> = {
  prefix: `nxn`,
  level: 1,
};

/**
 * Logger that writes `[prefix] message` lines to the console
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const opts = { ...DEFAULT_CONSOLE_LOGGER_OPTIONS, ...options };
  const tag = `[${opts.prefix}]`;
  return {
    level: opts.level,
    debug(level, message) {
      if (level <= opts.level) {
        console.debug(`${tag} ${message()}`);
      }
    },
    info(message) {
      console.info(`${tag} ${message}`);
    },
    warn(message) {
      console.warn(`${tag} ${message}`);
    },
  };
}

export const NOOP_LOGGER: Logger = {
  level: 0,
  debug() {},
  info() {},
  warn() {},
};

/**
 * Logger that forwards to `parent` with an extra prefix segment
 */
export function childLogger(parent: Logger, prefix: string): Logger {
  return {
    level: parent.level,
    debug(level, message) {
      parent.debug(level, () => `${prefix}: ${message()}`);
    },
    info(message) {
      parent.info(`${prefix}: ${message}`);
    },
    warn(message) {
      parent.warn(`${prefix}: ${message}`);
    },
  };
}
