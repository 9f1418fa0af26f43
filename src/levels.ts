/**
 * Severity levels, ordered from least to most severe.
 */

export const Level = {
  TRACE: 0,
  DEBUG: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
  FATAL: 5,
} as const;

export type Level = typeof Level[keyof typeof Level];

export type LevelName = keyof typeof Level;

const levelNames: readonly LevelName[] = ["TRACE", "DEBUG", "INFO", "WARN", "ERROR", "FATAL"];

export function isLevel(value: unknown): value is Level {
  return typeof value === "number" && Number.isInteger(value) && value >= Level.TRACE && value <= Level.FATAL;
}

export function getLevelName(level: Level): LevelName {
  return levelNames[level];
}

/**
 * Parse a level name, ignoring case. "WARNING" is accepted as an alias of WARN.
 */
export function parseLevel(name: string): Level | undefined {
  const upper = name.trim().toUpperCase();
  if (upper === "WARNING") return Level.WARN;
  const match = levelNames.find((candidate) => candidate === upper);
  return match === undefined ? undefined : Level[match];
}
