const encoder = new TextEncoder();
const decoder = new TextDecoder();

const NEWLINE = 0x0a;

/**
 * Growable UTF-8 scratch buffer. A logger keeps one and resets it for every line, so the
 * backing storage is allocated once and only grows when a longer line comes along.
 */
export class LineBuffer {
  private bytes: Uint8Array;
  private size = 0;

  constructor(initialCapacity = 256) {
    this.bytes = new Uint8Array(Math.max(initialCapacity, 16));
  }

  get length(): number {
    return this.size;
  }

  get capacity(): number {
    return this.bytes.length;
  }

  /** Drop the contents, keeping the storage. */
  reset(): void {
    this.size = 0;
  }

  append(text: string): this {
    if (text.length === 0) return this;
    // A UTF-16 code unit never encodes to more than three bytes
    this.ensure(text.length * 3);
    const { written } = encoder.encodeInto(text, this.bytes.subarray(this.size));
    this.size += written;
    return this;
  }

  appendBytes(data: Uint8Array): this {
    this.ensure(data.length);
    this.bytes.set(data, this.size);
    this.size += data.length;
    return this;
  }

  lastByte(): number | undefined {
    return this.size === 0 ? undefined : this.bytes[this.size - 1];
  }

  endsWithNewline(): boolean {
    return this.lastByte() === NEWLINE;
  }

  /** A view of the written bytes; only valid until the next mutation. */
  contents(): Uint8Array {
    return this.bytes.subarray(0, this.size);
  }

  toString(): string {
    return decoder.decode(this.contents());
  }

  private ensure(extra: number): void {
    const needed = this.size + extra;
    if (needed <= this.bytes.length) return;

    let capacity = this.bytes.length * 2;
    while (capacity < needed) capacity *= 2;

    const next = new Uint8Array(capacity);
    next.set(this.contents());
    this.bytes = next;
  }
}
