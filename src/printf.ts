/**
 * Message rendering for the logger entry points: Sprint/Sprintln-style joining and printf-style
 * formatting on top of sprintf-js, extended with byte and error verbs.
 *
 * Extra verbs:
 * - `%h` / `%H`: bytes as lowercase / uppercase hex, `% h` space-delimited, `%.16h` truncated
 * - `%w`: an error with its stack trace
 * - `%j`: JSON that survives BigInt values, circular references and throwing toJSON methods
 *
 * Function arguments are called at formatting time, which only happens when the level is enabled.
 */

import { inspect } from "node:util";
import sprintfJs from "sprintf-js";
import { internalError, internalWarn } from "./internal-logger.ts";

export type ByteArrayLike = Uint8Array | ArrayBuffer | readonly number[];

const LAZY_FAILURE = "[error evaluating lazy argument]";

// %[n$][flags][pad][-][width][.precision]verb
const PLACEHOLDER = /%%|%(?:(\d+)\$)?([+ ]*)(0|'.)?(-)?(\d+)?(?:\.(\d+))?([a-zA-Z])/g;

function isLazy(value: unknown): value is () => unknown {
  return typeof value === "function";
}

function isByteArrayLike(value: unknown): value is ByteArrayLike {
  if (value instanceof Uint8Array || value instanceof ArrayBuffer) return true;
  return Array.isArray(value) && value.every((item) => typeof item === "number");
}

function evaluateLazy(value: unknown): unknown {
  if (!isLazy(value)) return value;
  try {
    return value();
  }
  catch (error) {
    internalError(`Error evaluating lazy argument: ${error instanceof Error ? error.message : String(error)}`);
    return LAZY_FAILURE;
  }
}

/** Format an error for logging */
export function formatError(error: Error | unknown): string {
  if (error instanceof Error) return error.stack || `${error.name}: ${error.message}`;
  return `Non-Error exception: ${String(error)}`;
}

/**
 * Convert bytes to hex, optionally truncated after `maxBytes` with a count of what was left out.
 */
export function toHex(data: ByteArrayLike, delimiter: string = " ", maxBytes?: number, uppercase = false): string {
  const bytes = data instanceof Uint8Array
    ? data
    : data instanceof ArrayBuffer
    ? new Uint8Array(data)
    : Uint8Array.from(data);
  const shown = maxBytes !== undefined && maxBytes < bytes.length ? bytes.subarray(0, Math.max(maxBytes, 0)) : bytes;

  let hex = Array.from(shown, (byte) => byte.toString(16).padStart(2, "0")).join(delimiter);
  if (uppercase) hex = hex.toUpperCase();
  if (shown.length < bytes.length) {
    hex += `${delimiter}... [${bytes.length - shown.length} more bytes]`;
  }
  return hex;
}

function safeJson(value: unknown, indent: number): string {
  const ancestors: unknown[] = [];
  try {
    const json = JSON.stringify(value, function (this: unknown, _key: string, val: unknown) {
      if (typeof val === "bigint") return val.toString();
      if (typeof val !== "object" || val === null) return val;
      while (ancestors.length > 0 && ancestors[ancestors.length - 1] !== this) ancestors.pop();
      if (ancestors.includes(val)) return "[Circular]";
      ancestors.push(val);
      return val;
    }, indent);
    return json ?? String(value);
  }
  catch (error) {
    return `[Unserializable: ${error instanceof Error ? error.message : String(error)}]`;
  }
}

function formatValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return formatError(value);
  if (typeof value === "object" && value !== null) return inspect(value, { breakLength: Infinity });
  return String(value);
}

/**
 * Join values the way Sprint does: a space goes between two operands only when neither is a
 * string.
 */
export function sprint(...values: unknown[]): string {
  let out = "";
  let previousWasString = true;
  values.forEach((raw, index) => {
    const value = evaluateLazy(raw);
    const isString = typeof value === "string";
    if (index > 0 && !isString && !previousWasString) out += " ";
    out += formatValue(value);
    previousWasString = isString;
  });
  return out;
}

/**
 * Join values with single spaces and terminate with a newline.
 */
export function sprintln(...values: unknown[]): string {
  return `${values.map((value) => formatValue(evaluateLazy(value))).join(" ")}\n`;
}

/**
 * Rewrite the extension verbs into `%s` placeholders over pre-rendered arguments, leaving every
 * standard placeholder for sprintf-js.
 */
function expandVerbs(format: string, args: unknown[]): string {
  let cursor = 0;
  return format.replace(
    PLACEHOLDER,
    (whole: string, position?: string, flags?: string, pad?: string, align?: string, width?: string,
      precision?: string, verb?: string) => {
      if (whole === "%%" || verb === undefined) return whole;
      // "% " only means something to the hex verbs; anything else is left for sprintf-js to reject
      if (flags?.includes(" ") && verb !== "h" && verb !== "H") return whole;

      const index = position !== undefined ? Number.parseInt(position, 10) - 1 : cursor++;
      const at = position !== undefined ? `${position}$` : "";
      const plus = flags?.includes("+") ? "+" : "";
      const layout = `${pad ?? ""}${align ?? ""}${width ?? ""}`;

      switch (verb) {
        case "h":
        case "H": {
          const value = args[index];
          args[index] = isByteArrayLike(value)
            ? toHex(value, flags?.includes(" ") ? " " : "", precision === undefined ? undefined : Number(precision), verb === "H")
            : String(value);
          return `%${at}${layout}s`;
        }
        case "w":
          args[index] = formatError(args[index]);
          return `%${at}${layout}s`;
        case "j":
          args[index] = safeJson(args[index], width === undefined ? 0 : Number(width));
          return `%${at}s`;
        default:
          // sprintf-js has no space flag
          return `%${at}${plus}${layout}${precision === undefined ? "" : `.${precision}`}${verb}`;
      }
    },
  );
}

/**
 * printf-style formatting. Without arguments only `%%` is rewritten, to `%`; other placeholders
 * are left as written. A format sprintf-js rejects is reported and the values are appended to it
 * instead.
 */
export function sprintf(format: string, ...args: unknown[]): string {
  if (args.length === 0) return format.replace(/%%/g, "%");

  const values = args.map(evaluateLazy);
  try {
    return sprintfJs.vsprintf(expandVerbs(format, values), values);
  }
  catch (error) {
    internalWarn(`sprintf failed: ${error instanceof Error ? error.message : String(error)}; falling back to raw output`);
    return [format, ...values.map(formatValue)].join(" ");
  }
}

/**
 * Create a lazy hex formatter for byte arrays.
 * Returns a function that converts bytes to hex only when called.
 * Use with the logger's lazy evaluation feature to avoid formatting
 * bytes when the log level is disabled.
 *
 * @example
 * ```typescript
 * import { getLogger, lazyHex } from "tintlog";
 *
 * const logger = getLogger();
 * const bytes = new Uint8Array([0xde, 0xad, 0xbe, 0xef]);
 *
 * // Only converts to hex if DEBUG level is enabled (space-delimited by default)
 * logger.debugf("Received bytes: %s", lazyHex(bytes));
 * // Output: "de ad be ef"
 *
 * // Truncate large buffers
 * logger.debugf("First 16: %s", lazyHex(largeBuffer, " ", 16));
 * // Output: "01 02 03 ... [984 more bytes]"
 * ```
 *
 * @param data Uint8Array, ArrayBuffer, or number array
 * @param delimiter String between bytes (defaults to single space)
 * @param maxBytes Maximum bytes to output before truncating (no limit by default)
 */
export function lazyHex(data: ByteArrayLike, delimiter: string = " ", maxBytes?: number): () => string {
  return () => toHex(data, delimiter, maxBytes);
}

/**
 * Create a lazy error formatter. Returns a function that formats the error only when called.
 *
 * @example
 * ```typescript
 * logger.debugf("caught error: %s", lazyError(err));
 * ```
 */
export function lazyError(error: Error | unknown): () => string {
  return () => formatError(error);
}
