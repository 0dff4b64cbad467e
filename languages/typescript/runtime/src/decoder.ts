import type { Decode } from "./codec.js";
import { DecodeError } from "./errors.js";
import { isHalfExact, isSingleExact, fromHalfBits } from "./float16.js";
import {
  AI_INDEFINITE,
  AI_U8,
  BREAK,
  F16,
  F32,
  F64,
  Major,
  SIMPLE_FALSE,
  SIMPLE_NULL,
  SIMPLE_TRUE,
  SIMPLE_UNDEFINED,
  Type,
  argumentWidth,
  infoOf,
  initial,
  majorOf,
  minimalInfo,
  typeOf,
} from "./grammar.js";

const _td = new TextDecoder("utf-8", { fatal: true });

export const DEFAULT_MAX_DEPTH = 128;

export interface DecoderOptions {
  /** Maximum nesting of arrays, maps and tags. */
  maxDepth?: number;
  /** Reject non-minimal integer, length and float encodings. */
  strict?: boolean;
}

interface Head {
  major: Major;
  ai: number;
  arg: bigint;
  indefinite: boolean;
  /** Offset just past the initial byte and its argument. */
  end: number;
}

const MAJOR_NAMES = [
  "unsigned integer",
  "negative integer",
  "bytes",
  "text",
  "array",
  "map",
  "tag",
  "simple value",
];

/**
 * Cursor over an input buffer.
 *
 * Every read consumes exactly one item or throws a `DecodeError` and leaves
 * the cursor where it was.
 */
export class Decoder {
  private readonly buf: Uint8Array;
  private readonly view: DataView;
  private pos = 0;
  private depth = 0;
  readonly maxDepth: number;
  readonly strict: boolean;

  constructor(data: Uint8Array, options: DecoderOptions = {}) {
    this.buf = data;
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.strict = options.strict ?? false;
  }

  get position(): number {
    return this.pos;
  }

  /** Rewind or advance to a position saved earlier from `position`. */
  setPosition(pos: number): void {
    if (!Number.isInteger(pos) || pos < 0 || pos > this.buf.length) {
      throw new RangeError(`position ${pos} outside of input (length ${this.buf.length})`);
    }
    this.pos = pos;
  }

  get remaining(): number {
    return this.buf.length - this.pos;
  }

  get isEnd(): boolean {
    return this.pos >= this.buf.length;
  }

  get input(): Uint8Array {
    return this.buf;
  }

  // --- headers ---

  private byteAt(p: number): number {
    if (p >= this.buf.length) throw DecodeError.underflow(1, p);
    return this.buf[p];
  }

  private head(p: number): Head {
    const b = this.byteAt(p);
    const major = majorOf(b);
    const ai = infoOf(b);
    if (ai === AI_INDEFINITE) {
      if (major === Major.Unsigned || major === Major.Negative || major === Major.Tag) {
        throw DecodeError.invalid(`indefinite length not allowed for ${MAJOR_NAMES[major]}`, p);
      }
      return { major, ai, arg: 0n, indefinite: true, end: p + 1 };
    }
    const w = argumentWidth(ai);
    if (w < 0) throw DecodeError.invalid(`reserved additional information ${ai}`, p);
    if (p + 1 + w > this.buf.length) throw DecodeError.underflow(p + 1 + w - this.buf.length, p);
    let arg: bigint;
    switch (w) {
      case 0: arg = BigInt(ai); break;
      case 1: arg = BigInt(this.buf[p + 1]); break;
      case 2: arg = BigInt(this.view.getUint16(p + 1)); break;
      case 4: arg = BigInt(this.view.getUint32(p + 1)); break;
      default: arg = this.view.getBigUint64(p + 1);
    }
    if (this.strict && major !== Major.Simple && w > 0 && minimalInfo(arg) !== ai) {
      throw new DecodeError("non-canonical", `argument ${arg} not encoded in minimal width`, p);
    }
    return { major, ai, arg, indefinite: false, end: p + 1 + w };
  }

  /** Header of the next item, which must have the given major type. */
  private expect(major: Major, expected: string): Head {
    const b = this.byteAt(this.pos);
    if (majorOf(b) !== major) throw DecodeError.typeMismatch(typeOf(b), expected, this.pos);
    return this.head(this.pos);
  }

  // --- peeking ---

  datatype(): Type {
    return typeOf(this.byteAt(this.pos));
  }

  peekMajor(): Major {
    return majorOf(this.byteAt(this.pos));
  }

  isBreak(): boolean {
    return this.pos < this.buf.length && this.buf[this.pos] === BREAK;
  }

  /** Consume the break byte closing an indefinite-length item. */
  readBreak(): void {
    const b = this.byteAt(this.pos);
    if (b !== BREAK) throw DecodeError.typeMismatch(typeOf(b), "break", this.pos);
    this.pos += 1;
  }

  // --- integers ---

  unsigned(): bigint {
    const h = this.expect(Major.Unsigned, "unsigned integer");
    this.pos = h.end;
    return h.arg;
  }

  negative(): bigint {
    const h = this.expect(Major.Negative, "negative integer");
    this.pos = h.end;
    return -1n - h.arg;
  }

  /** Any integer, major type 0 or 1. */
  int(): bigint {
    return this.signed(-0x10000000000000000n, 0xffffffffffffffffn, "integer");
  }

  private signed(min: bigint, max: bigint, target: string): bigint {
    const b = this.byteAt(this.pos);
    const major = majorOf(b);
    if (major !== Major.Unsigned && major !== Major.Negative) {
      throw DecodeError.typeMismatch(typeOf(b), target, this.pos);
    }
    const h = this.head(this.pos);
    const v = major === Major.Unsigned ? h.arg : -1n - h.arg;
    if (v < min || v > max) throw DecodeError.overflow(v, target, this.pos);
    this.pos = h.end;
    return v;
  }

  private uint(max: bigint, target: string): bigint {
    const h = this.expect(Major.Unsigned, target);
    if (h.arg > max) throw DecodeError.overflow(h.arg, target, this.pos);
    this.pos = h.end;
    return h.arg;
  }

  u8(): number { return Number(this.uint(0xffn, "u8")); }
  u16(): number { return Number(this.uint(0xffffn, "u16")); }
  u32(): number { return Number(this.uint(0xffffffffn, "u32")); }
  u64(): bigint { return this.uint(0xffffffffffffffffn, "u64"); }

  i8(): number { return Number(this.signed(-0x80n, 0x7fn, "i8")); }
  i16(): number { return Number(this.signed(-0x8000n, 0x7fffn, "i16")); }
  i32(): number { return Number(this.signed(-0x80000000n, 0x7fffffffn, "i32")); }
  i64(): bigint { return this.signed(-0x8000000000000000n, 0x7fffffffffffffffn, "i64"); }

  // --- strings ---

  private chunksAt(p: number, major: Major.Bytes | Major.Text): { chunks: Uint8Array[]; end: number } {
    const h = this.head(p);
    if (!h.indefinite) {
      const end = this.payloadEnd(h, p);
      return { chunks: [this.buf.subarray(h.end, end)], end };
    }
    const chunks: Uint8Array[] = [];
    let q = h.end;
    for (;;) {
      const b = this.byteAt(q);
      if (b === BREAK) return { chunks, end: q + 1 };
      if (majorOf(b) !== major) {
        throw DecodeError.invalid(`${typeOf(b)} inside indefinite ${MAJOR_NAMES[major]}`, q);
      }
      const c = this.head(q);
      if (c.indefinite) throw DecodeError.invalid("nested indefinite string", q);
      const end = this.payloadEnd(c, q);
      chunks.push(this.buf.subarray(c.end, end));
      q = end;
    }
  }

  private payloadEnd(h: Head, p: number): number {
    const available = BigInt(this.buf.length - h.end);
    if (h.arg > available) throw DecodeError.underflow(Number(h.arg - available), p);
    return h.end + Number(h.arg);
  }

  /** Byte string; chunks of an indefinite byte string are concatenated. */
  bytes(): Uint8Array {
    this.expect(Major.Bytes, "bytes");
    const { chunks, end } = this.chunksAt(this.pos, Major.Bytes);
    const out = concat(chunks);
    this.pos = end;
    return out;
  }

  /** Zero-copy views of each chunk of a (possibly indefinite) byte string. */
  bytesChunks(): Uint8Array[] {
    this.expect(Major.Bytes, "bytes");
    const { chunks, end } = this.chunksAt(this.pos, Major.Bytes);
    this.pos = end;
    return chunks;
  }

  text(): string {
    return this.textChunks().join("");
  }

  textChunks(): string[] {
    this.expect(Major.Text, "text");
    const { chunks, end } = this.chunksAt(this.pos, Major.Text);
    const out = chunks.map((c) => this.utf8(c));
    this.pos = end;
    return out;
  }

  private utf8(chunk: Uint8Array): string {
    try {
      return _td.decode(chunk);
    } catch (err) {
      throw new DecodeError("utf8", "invalid utf-8 in text string", this.pos, { cause: err });
    }
  }

  // --- containers ---

  /** Array header. Returns the length, or `null` for an indefinite array. */
  array(): number | null {
    return this.container(Major.Array, "array", 1n);
  }

  /** Map header. Returns the number of entries, or `null` for an indefinite map. */
  map(): number | null {
    return this.container(Major.Map, "map", 2n);
  }

  private container(major: Major, expected: string, itemsPerEntry: bigint): number | null {
    const h = this.expect(major, expected);
    if (h.indefinite) {
      this.pos = h.end;
      return null;
    }
    // Every item takes at least one byte.
    const needed = h.arg * itemsPerEntry;
    const available = BigInt(this.buf.length - h.end);
    if (needed > available) throw DecodeError.underflow(Number(needed - available), this.pos);
    this.pos = h.end;
    return Number(h.arg);
  }

  tag(): bigint {
    const h = this.expect(Major.Tag, "tag");
    this.pos = h.end;
    return h.arg;
  }

  // --- simple values and floats ---

  bool(): boolean {
    const b = this.byteAt(this.pos);
    if (b === initial(Major.Simple, SIMPLE_TRUE) || b === initial(Major.Simple, SIMPLE_FALSE)) {
      this.pos += 1;
      return b === initial(Major.Simple, SIMPLE_TRUE);
    }
    throw DecodeError.typeMismatch(typeOf(b), "bool", this.pos);
  }

  null(): null {
    const b = this.byteAt(this.pos);
    if (b !== initial(Major.Simple, SIMPLE_NULL)) throw DecodeError.typeMismatch(typeOf(b), "null", this.pos);
    this.pos += 1;
    return null;
  }

  undefined(): undefined {
    const b = this.byteAt(this.pos);
    if (b !== initial(Major.Simple, SIMPLE_UNDEFINED)) {
      throw DecodeError.typeMismatch(typeOf(b), "undefined", this.pos);
    }
    this.pos += 1;
    return undefined;
  }

  simple(): number {
    const b = this.byteAt(this.pos);
    const ai = infoOf(b);
    if (majorOf(b) !== Major.Simple || ai > AI_U8) {
      throw DecodeError.typeMismatch(typeOf(b), "simple value", this.pos);
    }
    const h = this.head(this.pos);
    if (ai === AI_U8 && h.arg < 32n) {
      throw DecodeError.invalid(`simple value ${h.arg} in two-byte form`, this.pos);
    }
    this.pos = h.end;
    return Number(h.arg);
  }

  f16(): number {
    return this.floatOf(F16, Type.F16);
  }

  f32(): number {
    return this.floatOf(F32, Type.F32);
  }

  f64(): number {
    return this.floatOf(F64, Type.F64);
  }

  /** A float of any width. */
  float(): number {
    const b = this.byteAt(this.pos);
    if (b === F16 || b === F32 || b === F64) return this.floatOf(b, typeOf(b));
    throw DecodeError.typeMismatch(typeOf(b), "float", this.pos);
  }

  private floatOf(marker: number, type: Type): number {
    const p = this.pos;
    const b = this.byteAt(p);
    if (b !== marker) throw DecodeError.typeMismatch(typeOf(b), type, p);
    const w = argumentWidth(infoOf(b));
    if (p + 1 + w > this.buf.length) throw DecodeError.underflow(p + 1 + w - this.buf.length, p);
    let v: number;
    if (w === 2) {
      v = fromHalfBits(this.view.getUint16(p + 1));
    } else if (w === 4) {
      v = this.view.getFloat32(p + 1);
      if (this.strict && isHalfExact(v)) throw new DecodeError("non-canonical", `f32 ${v} fits into f16`, p);
    } else {
      v = this.view.getFloat64(p + 1);
      if (this.strict && isSingleExact(v)) throw new DecodeError("non-canonical", `f64 ${v} fits into f32`, p);
    }
    this.pos = p + 1 + w;
    return v;
  }

  // --- skipping ---

  /**
   * Consume one complete item of any shape without producing it. Nested
   * containers and tags count against the same depth limit as `nested`.
   */
  skip(): void {
    this.pos = this.skipAt(this.pos, this.maxDepth - this.depth);
  }

  private skipAt(p: number, budget: number): number {
    const h = this.head(p);
    switch (h.major) {
      case Major.Unsigned:
      case Major.Negative:
        return h.end;
      case Major.Bytes:
      case Major.Text:
        return this.chunksAt(p, h.major).end;
      case Major.Array:
      case Major.Map: {
        if (budget <= 0) throw DecodeError.depth(this.maxDepth, p);
        const isMap = h.major === Major.Map;
        let q = h.end;
        if (h.indefinite) {
          for (;;) {
            if (this.byteAt(q) === BREAK) return q + 1;
            q = this.skipAt(q, budget - 1);
            if (isMap) {
              if (this.byteAt(q) === BREAK) throw DecodeError.invalid("break between map key and value", q);
              q = this.skipAt(q, budget - 1);
            }
          }
        }
        const n = isMap ? h.arg * 2n : h.arg;
        if (n > BigInt(this.buf.length - q)) throw DecodeError.underflow(Number(n - BigInt(this.buf.length - q)), p);
        for (let i = 0; i < Number(n); i++) q = this.skipAt(q, budget - 1);
        return q;
      }
      case Major.Tag:
        if (budget <= 0) throw DecodeError.depth(this.maxDepth, p);
        return this.skipAt(h.end, budget - 1);
      default:
        if (h.indefinite) throw DecodeError.invalid("unexpected break", p);
        if (h.ai === AI_U8 && h.arg < 32n) throw DecodeError.invalid(`simple value ${h.arg} in two-byte form`, p);
        return h.end;
    }
  }

  // --- structure ---

  /** Run `fn` one nesting level deeper, failing once `maxDepth` is reached. */
  nested<T>(fn: () => T): T {
    if (this.depth >= this.maxDepth) throw DecodeError.depth(this.maxDepth, this.pos);
    this.depth++;
    try {
      return fn();
    } finally {
      this.depth--;
    }
  }

  /**
   * Try `fn`; on a `DecodeError` rewind to where it started and return
   * `undefined`. Other errors propagate.
   */
  attempt<T>(fn: (d: Decoder) => T): T | undefined {
    const saved = this.pos;
    try {
      return fn(this);
    } catch (err) {
      if (!(err instanceof DecodeError)) throw err;
      this.pos = saved;
      return undefined;
    }
  }

  /** Decode one value with a codec. On failure the cursor is left where it started. */
  decode<T, C>(codec: Decode<T, C>, ctx: C): T {
    const saved = this.pos;
    try {
      return codec.decode(this, ctx);
    } catch (err) {
      this.pos = saved;
      throw err;
    }
  }
}

function concat(chunks: Uint8Array[]): Uint8Array {
  if (chunks.length === 1) return chunks[0].slice();
  let len = 0;
  for (const c of chunks) len += c.length;
  const out = new Uint8Array(len);
  let at = 0;
  for (const c of chunks) {
    out.set(c, at);
    at += c.length;
  }
  return out;
}
