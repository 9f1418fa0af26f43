/**
 * Internal logging for tintlog itself.
 * This module avoids circular dependencies by using a setter pattern.
 */

type LogFn = (message: string) => void;

const defaultErrorFn: LogFn = (message: string) => {
  // Fallback before the default logger is initialized
  console.error(`[tintlog] ${message}`);
};

const defaultWarnFn: LogFn = (message: string) => {
  // Fallback before the default logger is initialized
  console.warn(`[tintlog] ${message}`);
};

let errorFn: LogFn = defaultErrorFn;
let warnFn: LogFn = defaultWarnFn;

/**
 * Set the internal error function. Called by default.ts once the default logger exists.
 */
export function setInternalErrorFn(fn: LogFn): void {
  errorFn = fn;
}

/**
 * Set the internal warning function. Called by default.ts once the default logger exists.
 */
export function setInternalWarnFn(fn: LogFn): void {
  warnFn = fn;
}

/** Restore the console fallbacks. */
export function resetInternalLogFns(): void {
  errorFn = defaultErrorFn;
  warnFn = defaultWarnFn;
}

/**
 * Log an internal library error (failed writes, failing lazy arguments, bad format strings).
 */
export function internalError(message: string): void {
  errorFn(message);
}

/**
 * Log an internal library warning.
 */
export function internalWarn(message: string): void {
  warnFn(message);
}

/**
 * Report a failed write on a path that has no caller to return the error to.
 */
export function reportWriteFailure(err: Error | undefined): void {
  if (err) errorFn(`log write failed: ${err.message}`);
}
