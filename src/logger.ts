/**
 * Logging contract used across the engine. Messages are plain strings;
 * the optional context object is passed through to the sink as-is.
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

function write(
  sink: (...args: unknown[]) => void,
  message: string,
  context?: Record<string, unknown>
): void {
  if (context) sink(`[flow-engine] ${message}`, context);
  else sink(`[flow-engine] ${message}`);
}

export const consoleLogger: Logger = {
  debug: (message, context) => write(console.debug, message, context),
  info: (message, context) => write(console.info, message, context),
  warn: (message, context) => write(console.warn, message, context),
  error: (message, context) => write(console.error, message, context),
};

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
