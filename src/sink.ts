import { closeSync, mkdirSync, openSync, writeSync } from "node:fs";
import { dirname } from "node:path";
import { Writable } from "node:stream";
import { internalError } from "./internal-logger.ts";
import type { Sink } from "./types.ts";

// Streams that already carry an error listener; many loggers may share process.stderr
const watched = new WeakSet<Writable>();

/**
 * Adapts a Node writable stream. Each line is copied before it is handed over, since the
 * stream may hold on to it after `write` returns. Stream errors arrive asynchronously and are
 * reported through the internal logger.
 *
 * Backpressure is not honoured: logging stays synchronous, so a stream that drains slower than
 * lines arrive (a pipe, an fs.WriteStream) keeps the pending lines in memory. Use `FdSink` or
 * `openFileSink` where that matters.
 */
export class StreamSink implements Sink {
  constructor(readonly stream: Writable) {
    if (!watched.has(stream)) {
      watched.add(stream);
      stream.on("error", (error: Error) => {
        internalError(`log stream error: ${error.message}`);
      });
    }
  }

  write(data: Uint8Array): number {
    if (this.stream.destroyed || this.stream.writableEnded) {
      throw new Error("log stream is closed");
    }
    this.stream.write(Buffer.from(data));
    return data.length;
  }
}

/**
 * Writes synchronously to a file descriptor. Short writes are continued until every byte is
 * out; a failing write throws.
 */
export class FdSink implements Sink {
  constructor(readonly fd: number) {}

  write(data: Uint8Array): number {
    let offset = 0;
    while (offset < data.length) {
      offset += writeSync(this.fd, data, offset, data.length - offset);
    }
    return offset;
  }
}

export class FileSink extends FdSink {
  private closed = false;

  constructor(readonly path: string, fd: number) {
    super(fd);
  }

  override write(data: Uint8Array): number {
    if (this.closed) throw new Error(`log file ${this.path} is closed`);
    return super.write(data);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    closeSync(this.fd);
  }
}

const openFlags = { a: "a", w: "w", x: "wx" } as const;

/**
 * Open a log file, creating its directory first. Mode "a" appends, "w" truncates and "x"
 * fails when the file already exists.
 */
export function openFileSink(path: string, mode: "a" | "w" | "x" = "a"): FileSink {
  mkdirSync(dirname(path), { recursive: true });
  return new FileSink(path, openSync(path, openFlags[mode]));
}

/** Accepts and drops every line. */
export const discard: Sink = {
  write: (data: Uint8Array) => data.length,
};

export function toSink(out: Sink | Writable): Sink {
  return out instanceof Writable ? new StreamSink(out) : out;
}
