/**
 * Leveled logging capability injected into a CloudShelf.
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Logger that discards everything. Used when no logger is given.
 */
export const noopLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

function write(
  sink: (...args: unknown[]) => void,
  message: string,
  context?: Record<string, unknown>
): void {
  if (context === undefined) {
    sink(message);
  } else {
    sink(message, context);
  }
}

/**
 * Logger that prints through `console`.
 */
export const consoleLogger: Logger = {
  debug: (message, context) => write(console.debug, message, context),
  info: (message, context) => write(console.info, message, context),
  warn: (message, context) => write(console.warn, message, context),
  error: (message, context) => write(console.error, message, context),
};
