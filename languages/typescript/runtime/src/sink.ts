import { EncodeError } from "./errors.js";

/** Anything that accepts encoded bytes. Implementations throw an `EncodeError` of kind "write" to reject. */
export interface Sink {
  write(bytes: Uint8Array): void;
}

/** Heap-backed sink that grows by doubling. */
export class ArraySink implements Sink {
  private buf: Uint8Array;
  private pos = 0;

  constructor(initialCapacity = 256) {
    this.buf = new Uint8Array(Math.max(initialCapacity, 1));
  }

  get length(): number {
    return this.pos;
  }

  write(bytes: Uint8Array): void {
    this.grow(bytes.length);
    this.buf.set(bytes, this.pos);
    this.pos += bytes.length;
  }

  private grow(n: number): void {
    if (this.pos + n <= this.buf.length) return;
    let c = this.buf.length;
    while (c < this.pos + n) c *= 2;
    const nb = new Uint8Array(c);
    nb.set(this.buf.subarray(0, this.pos));
    this.buf = nb;
  }

  /** Copy of everything written so far. */
  toBytes(): Uint8Array {
    return this.buf.slice(0, this.pos);
  }

  reset(): void {
    this.pos = 0;
  }
}

/** Writes into a caller-provided buffer and never allocates. */
export class SliceSink implements Sink {
  private readonly buf: Uint8Array;
  private pos = 0;

  constructor(buf: Uint8Array) {
    this.buf = buf;
  }

  get length(): number {
    return this.pos;
  }

  get capacity(): number {
    return this.buf.length;
  }

  write(bytes: Uint8Array): void {
    if (this.pos + bytes.length > this.buf.length) {
      throw EncodeError.write(
        `buffer full: ${bytes.length} byte(s) requested, ${this.buf.length - this.pos} available`,
      );
    }
    this.buf.set(bytes, this.pos);
    this.pos += bytes.length;
  }

  /** View of the written prefix of the underlying buffer. */
  written(): Uint8Array {
    return this.buf.subarray(0, this.pos);
  }
}
