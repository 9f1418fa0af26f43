/**
 * Shared types for loggers, formatters, sinks and configuration
 */

import type { LineBuffer } from "./buffer.ts";
import type { FlagName } from "./flags.ts";
import type { Level, LevelName } from "./levels.ts";

/** Snapshot of one log call, handed to the formatter and then discarded. */
export interface LogMessage {
  readonly time: Date;
  readonly file: string;
  readonly line: number;
  readonly level: Level;

  // Settings copied from the logger at emission time
  readonly prefix: string;
  readonly flag: number;
}

/**
 * Renders the metadata of a line. Appends to `buf` only, reads only `msg`, and never calls back
 * into the logger's state.
 */
export type FormatFunction = (msg: LogMessage, buf: LineBuffer) => void;

export interface Formatter {
  format: FormatFunction;
}

/**
 * Destination for rendered lines. `write` receives one complete line per call, returns the
 * number of bytes accepted and throws when the write fails. The bytes are only valid for the
 * duration of the call.
 */
export interface Sink {
  write(data: Uint8Array): number;
}

export interface LoggerOptions {
  formatter?: Formatter | FormatFunction;
  /** Called by the fatal entry points. Defaults to process.exit. */
  exit?: (code: number) => never;
}

export interface LoggingConfig {
  level?: LevelName; // Level filter, defaults to INFO
  defaultLevel?: LevelName; // Level of print/printf/println, defaults to INFO
  prefix?: string;
  flags?: FlagName[] | number; // Defaults to ["default"]
  console?: ConsoleConfig;
  file?: FileConfig;
}

export interface ConsoleConfig {
  enabled?: boolean; // Defaults to true
  stream?: "stderr" | "stdout"; // Defaults to stderr
  colorized?: boolean; // Overrides the color flag when set
}

export interface FileConfig {
  enabled?: boolean; // Defaults to true if file config is present
  dir?: string; // Defaults to ./logs
  filename?: string; // Defaults to app.log
  mode?: "a" | "w" | "x"; // Defaults to "a" (append)
}
