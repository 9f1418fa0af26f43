/**
 * Rendering flags. The first five bits follow the layout of the conventional minimal logger so
 * flag values can be passed through unchanged; Color and Level sit above them.
 */
export const LogFlag = {
  /** the date in the local time zone: 2009/01/23 */
  Date: 1 << 0,
  /** the time in the local time zone: 01:23:23 */
  Time: 1 << 1,
  /** microsecond resolution: 01:23:23.123000, implies Time */
  Microseconds: 1 << 2,
  /** full file name and line number: /a/b/c/d.ts:23 */
  LongFile: 1 << 3,
  /** final file name element and line number: d.ts:23, overrides LongFile */
  ShortFile: 1 << 4,
  /** ANSI color per level, reset at the end of the rendered prefix */
  Color: 1 << 5,
  /** short level tag such as [W] */
  Level: 1 << 6,
  StdFlags: (1 << 0) | (1 << 1),
  Default: (1 << 0) | (1 << 1) | (1 << 5) | (1 << 6),
} as const;

export type FlagName =
  | "date"
  | "time"
  | "microseconds"
  | "longfile"
  | "shortfile"
  | "color"
  | "level"
  | "std"
  | "default";

export const flagNames: Record<FlagName, number> = {
  date: LogFlag.Date,
  time: LogFlag.Time,
  microseconds: LogFlag.Microseconds,
  longfile: LogFlag.LongFile,
  shortfile: LogFlag.ShortFile,
  color: LogFlag.Color,
  level: LogFlag.Level,
  std: LogFlag.StdFlags,
  default: LogFlag.Default,
};

export function hasFlag(flags: number, bits: number): boolean {
  return (flags & bits) !== 0;
}

export function flagsFromNames(names: readonly FlagName[]): number {
  return names.reduce((flags, name) => flags | flagNames[name], 0);
}
