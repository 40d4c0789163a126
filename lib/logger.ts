/**
 * Minimal logging surface. Every method is optional so callers can pass a
 * partial logger (or an object that only records warnings in tests).
 */
export interface Logger {
  debug?: (msg: string, context?: Record<string, unknown>) => void;
  info?: (msg: string, context?: Record<string, unknown>) => void;
  warn?: (msg: string, context?: Record<string, unknown>) => void;
  error?: (msg: string, context?: Record<string, unknown>) => void;
}

const withContext = (
  write: (...args: unknown[]) => void,
) =>
(msg: string, context?: Record<string, unknown>): void => {
  if (context && Object.keys(context).length > 0) {
    write(`[record-mapper] ${msg}`, context);
  } else {
    write(`[record-mapper] ${msg}`);
  }
};

export const consoleLogger: Logger = {
  debug: withContext(console.debug),
  info: withContext(console.info),
  warn: withContext(console.warn),
  error: withContext(console.error),
};

export const silentLogger: Logger = {};
