/**
 * Scan logger.
 *
 * Same surface as the step loggers handed to orchestration handlers, plus a
 * `debug` level that only prints in verbose mode.
 */

export type InventoryLogger = {
  debug: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
  child: (subsystem: string) => InventoryLogger;
};

export type ConsoleLoggerOptions = {
  verbose?: boolean;
  subsystem?: string;
};

/**
 * Console-backed logger. Everything goes to stderr so stdout stays free for
 * the summary and for piping the document.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): InventoryLogger {
  const prefix = options.subsystem ? `[aws-inventory:${options.subsystem}]` : "[aws-inventory]";

  return {
    debug: (msg) => {
      if (options.verbose) console.error(`${prefix} ${msg}`);
    },
    info: (msg) => console.error(`${prefix} ${msg}`),
    warn: (msg) => console.warn(`${prefix} ${msg}`),
    error: (msg) => console.error(`${prefix} ${msg}`),
    child: (subsystem) =>
      createConsoleLogger({
        ...options,
        subsystem: options.subsystem ? `${options.subsystem}:${subsystem}` : subsystem,
      }),
  };
}

const noop = () => {};

/** Logger that drops everything. */
export const silentLogger: InventoryLogger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  child: () => silentLogger,
};
