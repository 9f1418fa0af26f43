/**
 * Leveled, colorized logging for Node.js
 *
 * This library provides:
 * - Six ordered levels (TRACE to FATAL) with per-logger filtering
 * - ANSI colors, level tags, date/time and caller location controlled by flag bits
 * - A pluggable formatter rendering each line's prefix
 * - A process-wide default logger, configurable from ./configs/logging.jsonc
 *
 * @module
 */

export { createLogger, Logger } from "./src/logger.ts";
export { Level, type LevelName, getLevelName, isLevel, parseLevel } from "./src/levels.ts";
export { type FlagName, flagsFromNames, hasFlag, LogFlag } from "./src/flags.ts";
export { defaultFormat, defaultFormatter } from "./src/format.ts";
export { LineBuffer } from "./src/buffer.ts";
export { type CallerLocation, parseStackFrame, resolveCaller } from "./src/caller.ts";
export { discard, FdSink, FileSink, openFileSink, StreamSink, toSink } from "./src/sink.ts";
export { ConfigError, LogPanic } from "./src/errors.ts";
export {
  type ByteArrayLike,
  formatError,
  lazyError,
  lazyHex,
  sprint,
  sprintf,
  sprintln,
  toHex,
} from "./src/printf.ts";
export { createLoggerFromConfig, DEFAULT_CONFIG_PATH, loadLoggingConfig, parseLoggingConfig } from "./src/config.ts";
export {
  debug,
  debugf,
  debugln,
  defaultLevel,
  error,
  errorf,
  errorln,
  fatal,
  fatalf,
  fatalln,
  flags,
  getLogger,
  info,
  infof,
  infoln,
  levelFilter,
  output,
  panic,
  panicf,
  panicln,
  prefix,
  print,
  printf,
  println,
  setDefaultLevel,
  setFlags,
  setFormatter,
  setLevelFilter,
  setLogger,
  setOutput,
  setPrefix,
  trace,
  tracef,
  traceln,
  warn,
  warnf,
  warnln,
  wouldLog,
  writer,
} from "./src/default.ts";

export type {
  ConsoleConfig,
  FileConfig,
  FormatFunction,
  Formatter,
  LoggerOptions,
  LoggingConfig,
  LogMessage,
  Sink,
} from "./src/types.ts";
