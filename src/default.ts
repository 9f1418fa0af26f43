/**
 * The process-wide default logger and free functions that forward to it.
 *
 * The logger is built once, on first use, from ./configs/logging.jsonc (or defaults: standard
 * error, date, time, color and level tag, INFO). `setLogger` swaps in another instance.
 */

import type { Writable } from "node:stream";
import { createLoggerFromConfig, loadLoggingConfig } from "./config.ts";
import { LogPanic } from "./errors.ts";
import { internalWarn, reportWriteFailure, setInternalErrorFn, setInternalWarnFn } from "./internal-logger.ts";
import { Level } from "./levels.ts";
import type { Logger } from "./logger.ts";
import { sprint, sprintf, sprintln } from "./printf.ts";
import type { FormatFunction, Formatter, Sink } from "./types.ts";

let root: Logger | undefined;

function routeInternalLogging(): void {
  // Falls back to the console when the default logger itself cannot write
  setInternalErrorFn((message) => {
    const err = getLogger().output(1, Level.ERROR, `tintlog: ${message}`);
    if (err) console.error(`[tintlog] ${message} (${err.message})`);
  });
  setInternalWarnFn((message) => {
    const err = getLogger().output(1, Level.WARN, `tintlog: ${message}`);
    if (err) console.warn(`[tintlog] ${message} (${err.message})`);
  });
}

// A sink that cannot be opened (existing file in mode "x", unwritable dir) falls back to defaults
function createDefaultLogger(): Logger {
  const config = loadLoggingConfig();
  try {
    return createLoggerFromConfig(config);
  }
  catch (error) {
    internalWarn(`cannot set up logging from config, using standard error: ${error instanceof Error ? error.message : String(error)}`);
    return createLoggerFromConfig();
  }
}

/**
 * Get the default logger, creating it from configuration on first use.
 */
export function getLogger(): Logger {
  if (!root) {
    root = createDefaultLogger();
    routeInternalLogging();
  }
  return root;
}

/**
 * Replace the default logger.
 * @returns the previous instance, if one had been created
 */
export function setLogger(logger: Logger): Logger | undefined {
  const previous = root;
  root = logger;
  routeInternalLogging();
  return previous;
}

export function output(calldepth: number, level: Level, s: string): Error | undefined {
  return getLogger().output(calldepth + 1, level, s);
}

export function flags(): number {
  return getLogger().flags();
}

export function setFlags(flag: number): void {
  getLogger().setFlags(flag);
}

export function prefix(): string {
  return getLogger().prefix();
}

export function setPrefix(prefix: string): void {
  getLogger().setPrefix(prefix);
}

export function defaultLevel(): Level {
  return getLogger().defaultLevel();
}

export function setDefaultLevel(level: Level): void {
  getLogger().setDefaultLevel(level);
}

export function levelFilter(): Level {
  return getLogger().levelFilter();
}

export function setLevelFilter(level: Level): void {
  getLogger().setLevelFilter(level);
}

export function wouldLog(level: Level): boolean {
  return getLogger().wouldLog(level);
}

export function setFormatter(formatter: Formatter | FormatFunction): void {
  getLogger().setFormatter(formatter);
}

export function writer(): Sink {
  return getLogger().writer();
}

export function setOutput(out: Sink | Writable): void {
  getLogger().setOutput(out);
}

// ------------------------------------------------------------

export function print(...v: unknown[]): Error | undefined {
  const logger = getLogger();
  return logger.emit(2, logger.defaultLevel(), () => sprint(...v));
}

export function printf(format: string, ...v: unknown[]): Error | undefined {
  const logger = getLogger();
  return logger.emit(2, logger.defaultLevel(), () => sprintf(format, ...v));
}

export function println(...v: unknown[]): Error | undefined {
  const logger = getLogger();
  return logger.emit(2, logger.defaultLevel(), () => sprintln(...v));
}

// ------------------------------------------------------------

export function trace(...v: unknown[]): Error | undefined {
  return getLogger().emit(2, Level.TRACE, () => sprint(...v));
}

export function tracef(format: string, ...v: unknown[]): Error | undefined {
  return getLogger().emit(2, Level.TRACE, () => sprintf(format, ...v));
}

export function traceln(...v: unknown[]): Error | undefined {
  return getLogger().emit(2, Level.TRACE, () => sprintln(...v));
}

// ------------------------------------------------------------

export function debug(...v: unknown[]): Error | undefined {
  return getLogger().emit(2, Level.DEBUG, () => sprint(...v));
}

export function debugf(format: string, ...v: unknown[]): Error | undefined {
  return getLogger().emit(2, Level.DEBUG, () => sprintf(format, ...v));
}

export function debugln(...v: unknown[]): Error | undefined {
  return getLogger().emit(2, Level.DEBUG, () => sprintln(...v));
}

// ------------------------------------------------------------

export function info(...v: unknown[]): Error | undefined {
  return getLogger().emit(2, Level.INFO, () => sprint(...v));
}

export function infof(format: string, ...v: unknown[]): Error | undefined {
  return getLogger().emit(2, Level.INFO, () => sprintf(format, ...v));
}

export function infoln(...v: unknown[]): Error | undefined {
  return getLogger().emit(2, Level.INFO, () => sprintln(...v));
}

// ------------------------------------------------------------

export function warn(...v: unknown[]): Error | undefined {
  return getLogger().emit(2, Level.WARN, () => sprint(...v));
}

export function warnf(format: string, ...v: unknown[]): Error | undefined {
  return getLogger().emit(2, Level.WARN, () => sprintf(format, ...v));
}

export function warnln(...v: unknown[]): Error | undefined {
  return getLogger().emit(2, Level.WARN, () => sprintln(...v));
}

// ------------------------------------------------------------

export function error(...v: unknown[]): Error | undefined {
  return getLogger().emit(2, Level.ERROR, () => sprint(...v));
}

export function errorf(format: string, ...v: unknown[]): Error | undefined {
  return getLogger().emit(2, Level.ERROR, () => sprintf(format, ...v));
}

export function errorln(...v: unknown[]): Error | undefined {
  return getLogger().emit(2, Level.ERROR, () => sprintln(...v));
}

// ------------------------------------------------------------

export function fatal(...v: unknown[]): never {
  const logger = getLogger();
  reportWriteFailure(logger.emit(2, Level.FATAL, () => sprint(...v)));
  return logger.exit(1);
}

export function fatalf(format: string, ...v: unknown[]): never {
  const logger = getLogger();
  reportWriteFailure(logger.emit(2, Level.FATAL, () => sprintf(format, ...v)));
  return logger.exit(1);
}

export function fatalln(...v: unknown[]): never {
  const logger = getLogger();
  reportWriteFailure(logger.emit(2, Level.FATAL, () => sprintln(...v)));
  return logger.exit(1);
}

// ------------------------------------------------------------

export function panic(...v: unknown[]): never {
  const s = sprint(...v);
  reportWriteFailure(getLogger().output(2, Level.FATAL, s));
  throw new LogPanic(s);
}

export function panicf(format: string, ...v: unknown[]): never {
  const s = sprintf(format, ...v);
  reportWriteFailure(getLogger().output(2, Level.FATAL, s));
  throw new LogPanic(s);
}

export function panicln(...v: unknown[]): never {
  const s = sprintln(...v);
  reportWriteFailure(getLogger().output(2, Level.FATAL, s));
  throw new LogPanic(s);
}
