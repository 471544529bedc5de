// Line framing for IRC byte streams.
//
// Lines end in LF; a CR directly before the LF is part of the delimiter.
// Bytes after the last delimiter are carried over to the next push.

const LF = 0x0a;
const CR = 0x0d;

const INITIAL_CAPACITY = 4096;

/**
 * Accumulates received bytes and yields complete lines.
 *
 * The carryover lives at the start of one growable buffer. Its capacity is
 * kept across pushes and across `reset()`; it only grows when incoming bytes
 * do not fit.
 */
export class LineFramer {
  private buf: Uint8Array;
  private length = 0;

  constructor(initialCapacity: number = INITIAL_CAPACITY) {
    this.buf = new Uint8Array(Math.max(1, initialCapacity));
  }

  /** Bytes currently allocated for the carryover. */
  get capacity(): number {
    return this.buf.length;
  }

  /** Number of carried-over bytes. */
  get pendingLength(): number {
    return this.length;
  }

  /**
   * Append `chunk` and return every line it completes, in arrival order,
   * without their delimiters.
   */
  push(chunk: Uint8Array): Uint8Array[] {
    const scanFrom = this.length;
    this.append(chunk);

    const lines: Uint8Array[] = [];
    let lineStart = 0;
    const filled = this.buf.subarray(0, this.length);
    let newline = filled.indexOf(LF, scanFrom);

    while (newline !== -1) {
      let lineEnd = newline;
      if (lineEnd > lineStart && this.buf[lineEnd - 1] === CR) {
        lineEnd--;
      }
      lines.push(this.buf.slice(lineStart, lineEnd));
      lineStart = newline + 1;
      newline = filled.indexOf(LF, lineStart);
    }

    if (lineStart > 0) {
      this.buf.copyWithin(0, lineStart, this.length);
      this.length -= lineStart;
    }

    return lines;
  }

  /** Copy of the bytes waiting for a delimiter. */
  remainder(): Uint8Array {
    return this.buf.slice(0, this.length);
  }

  /** Drop the carryover, keeping capacity. */
  reset(): void {
    this.length = 0;
  }

  private append(chunk: Uint8Array): void {
    const needed = this.length + chunk.length;
    if (needed > this.buf.length) {
      let capacity = this.buf.length;
      while (capacity < needed) capacity *= 2;
      const grown = new Uint8Array(capacity);
      grown.set(this.buf.subarray(0, this.length));
      this.buf = grown;
    }
    this.buf.set(chunk, this.length);
    this.length = needed;
  }
}
