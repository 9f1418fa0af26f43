/**
 * Leveled logger with a pluggable line formatter.
 *
 * A Logger writes each line to its sink with a single `write` call. Node runs the whole pipeline
 * synchronously on one thread, so lines from concurrent tasks never interleave and state
 * changes made between calls are picked up by the next line.
 */

import type { Writable } from "node:stream";
import { LineBuffer } from "./buffer.ts";
import { resolveCaller } from "./caller.ts";
import { LogPanic } from "./errors.ts";
import { hasFlag, LogFlag } from "./flags.ts";
import { defaultFormatter } from "./format.ts";
import { reportWriteFailure } from "./internal-logger.ts";
import { Level } from "./levels.ts";
import { sprint, sprintf, sprintln } from "./printf.ts";
import { toSink } from "./sink.ts";
import type { FormatFunction, Formatter, LoggerOptions, LogMessage, Sink } from "./types.ts";

function toFormatter(formatter: Formatter | FormatFunction): Formatter {
  return typeof formatter === "function" ? { format: formatter } : formatter;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class Logger {
  private flag: number;
  private out: Sink;
  private formatter: Formatter;
  private buf = new LineBuffer(); // accumulated text of the line being written
  private emitting = false;
  private _prefix: string; // prepended to every line
  private _defaultLevel: Level = Level.INFO; // level of print/printf/println
  private _levelFilter: Level = Level.INFO; // lines below this level are dropped
  private readonly exitFn: (code: number) => never;

  constructor(out: Sink | Writable, prefix: string, flag: number, options: LoggerOptions = {}) {
    this.out = toSink(out);
    this._prefix = prefix;
    this.flag = flag;
    this.formatter = toFormatter(options.formatter ?? defaultFormatter);
    this.exitFn = options.exit ?? ((code: number) => process.exit(code));
  }

  /**
   * Replace the formatter. Lines already being rendered finish with the previous one.
   */
  setFormatter(formatter: Formatter | FormatFunction): void {
    this.formatter = toFormatter(formatter);
  }

  /**
   * Write one line at `level`. `calldepth` counts the frames between this method and the
   * code whose file and line should be reported: 1 is the direct caller of `output`.
   * Lines below the level filter are dropped without error.
   *
   * @returns the sink's error when the write failed
   */
  output(calldepth: number, level: Level, s: string): Error | undefined {
    if (level < this._levelFilter) return undefined;

    const time = new Date();
    let file = "";
    let line = 0;

    if (hasFlag(this.flag, LogFlag.ShortFile | LogFlag.LongFile)) {
      const caller = resolveCaller(calldepth);
      file = caller?.file ?? "???";
      line = caller?.line ?? 0;
    }

    // A sink or formatter logging through this logger gets its own buffer
    const nested = this.emitting;
    const buf = nested ? new LineBuffer() : this.buf;
    this.emitting = true;

    try {
      buf.reset();
      const msg: LogMessage = { time, file, line, level, prefix: this._prefix, flag: this.flag };

      this.formatter.format(msg, buf);
      buf.append(s);
      if (s.length > 0 && !s.endsWith("\n")) {
        buf.append("\n");
      }

      this.out.write(buf.contents());
      return undefined;
    }
    catch (error) {
      return toError(error);
    }
    finally {
      this.emitting = nested;
    }
  }

  /**
   * Render and write a line only if `level` passes the filter, so arguments are never
   * formatted for dropped lines. `calldepth` counts from the caller of `emit`.
   */
  emit(calldepth: number, level: Level, render: () => string): Error | undefined {
    if (level < this._levelFilter) return undefined;
    return this.output(calldepth + 1, level, render());
  }

  /** Run the exit hook, process.exit unless the logger was built with another one. */
  exit(code: number): never {
    return this.exitFn(code);
  }

  flags(): number {
    return this.flag;
  }

  setFlags(flag: number): void {
    this.flag = flag;
  }

  prefix(): string {
    return this._prefix;
  }

  setPrefix(prefix: string): void {
    this._prefix = prefix;
  }

  defaultLevel(): Level {
    return this._defaultLevel;
  }

  setDefaultLevel(level: Level): void {
    this._defaultLevel = level;
  }

  levelFilter(): Level {
    return this._levelFilter;
  }

  setLevelFilter(level: Level): void {
    this._levelFilter = level;
  }

  /** Whether a line at `level` would be written. Use it to guard expensive arguments. */
  wouldLog(level: Level): boolean {
    return level >= this._levelFilter;
  }

  writer(): Sink {
    return this.out;
  }

  setOutput(out: Sink | Writable): void {
    this.out = toSink(out);
  }

  // ------------------------------------------------------------

  print(...v: unknown[]): Error | undefined {
    return this.emit(2, this._defaultLevel, () => sprint(...v));
  }

  printf(format: string, ...v: unknown[]): Error | undefined {
    return this.emit(2, this._defaultLevel, () => sprintf(format, ...v));
  }

  println(...v: unknown[]): Error | undefined {
    return this.emit(2, this._defaultLevel, () => sprintln(...v));
  }

  // ------------------------------------------------------------

  trace(...v: unknown[]): Error | undefined {
    return this.emit(2, Level.TRACE, () => sprint(...v));
  }

  tracef(format: string, ...v: unknown[]): Error | undefined {
    return this.emit(2, Level.TRACE, () => sprintf(format, ...v));
  }

  traceln(...v: unknown[]): Error | undefined {
    return this.emit(2, Level.TRACE, () => sprintln(...v));
  }

  // ------------------------------------------------------------

  debug(...v: unknown[]): Error | undefined {
    return this.emit(2, Level.DEBUG, () => sprint(...v));
  }

  debugf(format: string, ...v: unknown[]): Error | undefined {
    return this.emit(2, Level.DEBUG, () => sprintf(format, ...v));
  }

  debugln(...v: unknown[]): Error | undefined {
    return this.emit(2, Level.DEBUG, () => sprintln(...v));
  }

  // ------------------------------------------------------------

  info(...v: unknown[]): Error | undefined {
    return this.emit(2, Level.INFO, () => sprint(...v));
  }

  infof(format: string, ...v: unknown[]): Error | undefined {
    return this.emit(2, Level.INFO, () => sprintf(format, ...v));
  }

  infoln(...v: unknown[]): Error | undefined {
    return this.emit(2, Level.INFO, () => sprintln(...v));
  }

  // ------------------------------------------------------------

  warn(...v: unknown[]): Error | undefined {
    return this.emit(2, Level.WARN, () => sprint(...v));
  }

  warnf(format: string, ...v: unknown[]): Error | undefined {
    return this.emit(2, Level.WARN, () => sprintf(format, ...v));
  }

  warnln(...v: unknown[]): Error | undefined {
    return this.emit(2, Level.WARN, () => sprintln(...v));
  }

  // ------------------------------------------------------------

  error(...v: unknown[]): Error | undefined {
    return this.emit(2, Level.ERROR, () => sprint(...v));
  }

  errorf(format: string, ...v: unknown[]): Error | undefined {
    return this.emit(2, Level.ERROR, () => sprintf(format, ...v));
  }

  errorln(...v: unknown[]): Error | undefined {
    return this.emit(2, Level.ERROR, () => sprintln(...v));
  }

  // ------------------------------------------------------------
  // Fatal exits even when the line was filtered out or could not be written.

  fatal(...v: unknown[]): never {
    reportWriteFailure(this.emit(2, Level.FATAL, () => sprint(...v)));
    return this.exit(1);
  }

  fatalf(format: string, ...v: unknown[]): never {
    reportWriteFailure(this.emit(2, Level.FATAL, () => sprintf(format, ...v)));
    return this.exit(1);
  }

  fatalln(...v: unknown[]): never {
    reportWriteFailure(this.emit(2, Level.FATAL, () => sprintln(...v)));
    return this.exit(1);
  }

  // ------------------------------------------------------------

  panic(...v: unknown[]): never {
    const s = sprint(...v);
    reportWriteFailure(this.output(2, Level.FATAL, s));
    throw new LogPanic(s);
  }

  panicf(format: string, ...v: unknown[]): never {
    const s = sprintf(format, ...v);
    reportWriteFailure(this.output(2, Level.FATAL, s));
    throw new LogPanic(s);
  }

  panicln(...v: unknown[]): never {
    const s = sprintln(...v);
    reportWriteFailure(this.output(2, Level.FATAL, s));
    throw new LogPanic(s);
  }
}

/**
 * Create a logger writing to `out`, the counterpart of the minimal logger's constructor.
 */
export function createLogger(out: Sink | Writable, prefix: string, flag: number, options?: LoggerOptions): Logger {
  return new Logger(out, prefix, flag, options);
}
