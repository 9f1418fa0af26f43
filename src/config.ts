/**
 * Logging configuration, read from ./configs/logging.jsonc on first use of the default logger
 */

import { readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import jsonc, { type ParseError } from "jsonc-parser";
import { z } from "zod";
import { ConfigError } from "./errors.ts";
import { flagNames, flagsFromNames, LogFlag } from "./flags.ts";
import { internalWarn } from "./internal-logger.ts";
import { getLevelName, Level, parseLevel } from "./levels.ts";
import { Logger } from "./logger.ts";
import { discard, openFileSink } from "./sink.ts";
import type { LoggerOptions, LoggingConfig } from "./types.ts";

export const DEFAULT_CONFIG_PATH = "./configs/logging.jsonc";

// Same spellings as parseLevel: any case, WARNING for WARN
const levelNameSchema = z.string().transform((name, ctx) => {
  const level = parseLevel(name);
  if (level === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown level "${name}"` });
    return z.NEVER;
  }
  return getLevelName(level);
});
const flagNameSchema = z.enum(["date", "time", "microseconds", "longfile", "shortfile", "color", "level", "std", "default"]);

const loggingConfigSchema: z.ZodType<LoggingConfig, z.ZodTypeDef, unknown> = z.object({
  level: levelNameSchema.optional(),
  defaultLevel: levelNameSchema.optional(),
  prefix: z.string().optional(),
  flags: z.union([z.array(flagNameSchema), z.number().int().nonnegative()]).optional(),
  console: z.object({
    enabled: z.boolean().optional(),
    stream: z.enum(["stderr", "stdout"]).optional(),
    colorized: z.boolean().optional(),
  }).strict().optional(),
  file: z.object({
    enabled: z.boolean().optional(),
    dir: z.string().min(1).optional(),
    filename: z.string().min(1).optional(),
    mode: z.enum(["a", "w", "x"]).optional(),
  }).strict().optional(),
}).strict();

/**
 * Parse and validate the text of a logging.jsonc file
 * @throws ConfigError when the text is not valid JSONC or does not match the schema
 */
export function parseLoggingConfig(text: string, source?: string): LoggingConfig {
  const errors: ParseError[] = [];
  const raw: unknown = jsonc.parse(text, errors, { allowTrailingComma: true });
  if (errors.length > 0) {
    const first = errors[0];
    throw new ConfigError(`${jsonc.printParseErrorCode(first.error)} at offset ${first.offset}`, source);
  }

  const result = loggingConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigError(issues.join("; "), source);
  }
  return result.data;
}

/**
 * Load logging config from file synchronously. A missing file yields undefined silently;
 * an unreadable or invalid one is reported and also yields undefined.
 */
export function loadLoggingConfig(path: string = DEFAULT_CONFIG_PATH): LoggingConfig | undefined {
  const fullPath = resolve(path);
  let text: string;
  try {
    text = readFileSync(fullPath, "utf8");
  }
  catch (error) {
    // File doesn't exist - that's ok, use defaults
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return undefined;
    internalWarn(`cannot read ${fullPath}: ${error instanceof Error ? error.message : String(error)}`);
    return undefined;
  }

  try {
    return parseLoggingConfig(text, fullPath);
  }
  catch (error) {
    internalWarn(`ignoring logging config: ${error instanceof Error ? error.message : String(error)}`);
    return undefined;
  }
}

function resolveFlags(config: LoggingConfig): number {
  let flags = config.flags === undefined
    ? LogFlag.Default
    : typeof config.flags === "number"
    ? config.flags
    : flagsFromNames(config.flags);

  if (config.console?.colorized === true) flags |= flagNames.color;
  if (config.console?.colorized === false) flags &= ~flagNames.color;
  return flags;
}

/**
 * Build a logger from configuration. The file sink, when configured and enabled, replaces the
 * console stream; lines go to exactly one place, or nowhere when both are disabled.
 */
export function createLoggerFromConfig(config: LoggingConfig = {}, options?: LoggerOptions): Logger {
  const file = config.file;
  const useFile = file !== undefined && file.enabled !== false;

  const consoleEnabled = config.console?.enabled !== false;

  const sink = useFile
    ? openFileSink(join(file.dir ?? "./logs", file.filename ?? "app.log"), file.mode ?? "a")
    : !consoleEnabled
    ? discard
    : config.console?.stream === "stdout"
    ? process.stdout
    : process.stderr;

  const logger = new Logger(sink, config.prefix ?? "", resolveFlags(config), options);
  logger.setLevelFilter(Level[config.level ?? "INFO"]);
  logger.setDefaultLevel(Level[config.defaultLevel ?? "INFO"]);
  return logger;
}
