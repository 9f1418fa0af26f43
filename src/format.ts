import type { LineBuffer } from "./buffer.ts";
import { hasFlag, LogFlag } from "./flags.ts";
import { Level } from "./levels.ts";
import type { Formatter, LogMessage } from "./types.ts";

const levelColors: Record<Level, string> = {
  [Level.TRACE]: "\x1b[34m", // Blue
  [Level.DEBUG]: "\x1b[34m", // Blue
  [Level.INFO]: "\x1b[32m", // Green
  [Level.WARN]: "\x1b[33m", // Yellow
  [Level.ERROR]: "\x1b[31m", // Red
  [Level.FATAL]: "\x1b[31m", // Red
};

const levelTags: Record<Level, string> = {
  [Level.TRACE]: "[T]",
  [Level.DEBUG]: "[D]",
  [Level.INFO]: "[I]",
  [Level.WARN]: "[W]",
  [Level.ERROR]: "[E]",
  [Level.FATAL]: "[F]",
};

const RESET = "\x1b[0m";

function pad(value: number, width: number): string {
  return value.toString().padStart(width, "0");
}

function shortFile(file: string): string {
  const slash = Math.max(file.lastIndexOf("/"), file.lastIndexOf("\\"));
  return slash === -1 ? file : file.slice(slash + 1);
}

/**
 * The default line prefix: color, logger prefix, level tag, date, time, file location and color
 * reset, each gated by its flag except the prefix.
 */
export function defaultFormat(msg: LogMessage, buf: LineBuffer): void {
  const flag = msg.flag;

  if (hasFlag(flag, LogFlag.Color)) {
    const color = levelColors[msg.level];
    if (color !== undefined) buf.append(color);
  }

  buf.append(msg.prefix);

  if (hasFlag(flag, LogFlag.Level)) {
    const tag = levelTags[msg.level];
    if (tag !== undefined) buf.append(tag).append(" ");
  }

  if (hasFlag(flag, LogFlag.Date)) {
    const t = msg.time;
    buf.append(`${pad(t.getFullYear(), 4)}/${pad(t.getMonth() + 1, 2)}/${pad(t.getDate(), 2)} `);
  }

  if (hasFlag(flag, LogFlag.Time | LogFlag.Microseconds)) {
    const t = msg.time;
    buf.append(`${pad(t.getHours(), 2)}:${pad(t.getMinutes(), 2)}:${pad(t.getSeconds(), 2)}`);
    if (hasFlag(flag, LogFlag.Microseconds)) {
      // Date resolves milliseconds only
      buf.append(`.${pad(t.getMilliseconds() * 1000, 6)}`);
    }
    buf.append(" ");
  }

  if (hasFlag(flag, LogFlag.ShortFile | LogFlag.LongFile)) {
    const file = hasFlag(flag, LogFlag.ShortFile) ? shortFile(msg.file) : msg.file;
    buf.append(`${file}:${msg.line}: `);
  }

  if (hasFlag(flag, LogFlag.Color)) {
    buf.append(RESET);
  }
}

export const defaultFormatter: Formatter = { format: defaultFormat };
