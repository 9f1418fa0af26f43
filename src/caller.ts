import { fileURLToPath } from "node:url";

export interface CallerLocation {
  file: string;
  line: number;
}

// "    at fn (/path/file.ts:12:5)", "    at /path/file.ts:12:5", "    at async fn (file:///x.ts:1:2)"
const FRAME_PATTERN = /^\s*at (?:.*? \()?(.+?):(\d+):\d+\)?$/;

/**
 * Parse one V8 stack frame line into a file and line number.
 */
export function parseStackFrame(frame: string): CallerLocation | undefined {
  const match = FRAME_PATTERN.exec(frame);
  if (!match) return undefined;

  let file = match[1];
  if (file.startsWith("file://")) {
    try {
      file = fileURLToPath(file);
    }
    catch {
      return undefined;
    }
  }

  const line = Number.parseInt(match[2], 10);
  if (!Number.isFinite(line)) return undefined;
  return { file, line };
}

/**
 * Find the source location `calldepth` frames above the function calling this one.
 * A depth of 0 is that function itself.
 */
export function resolveCaller(calldepth: number): CallerLocation | undefined {
  const limit = Error.stackTraceLimit;
  Error.stackTraceLimit = Math.max(limit, calldepth + 1);

  const holder: { stack?: string } = {};
  try {
    Error.captureStackTrace(holder, resolveCaller);
  }
  finally {
    Error.stackTraceLimit = limit;
  }

  const frames = (holder.stack ?? "").split("\n").filter((line) => /^\s*at /.test(line));
  const frame = frames[calldepth];
  return frame === undefined ? undefined : parseStackFrame(frame);
}
