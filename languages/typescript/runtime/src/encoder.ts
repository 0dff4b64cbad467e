import type { Encode } from "./codec.js";
import { EncodeError } from "./errors.js";
import { isHalfExact, isSingleExact, toHalfBits } from "./float16.js";
import {
  AI_INDEFINITE,
  AI_U16,
  AI_U32,
  AI_U64,
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
  U64_MAX,
  initial,
  minimalInfo,
} from "./grammar.js";
import type { Sink } from "./sink.js";

const _te = new TextEncoder();

function toBigInt(n: number | bigint, what: string): bigint {
  if (typeof n === "bigint") return n;
  if (!Number.isSafeInteger(n)) {
    throw EncodeError.invalidValue(`${what}: ${n} is not a safe integer`);
  }
  return BigInt(n);
}

function checkRange(n: number | bigint, min: bigint, max: bigint, what: string): bigint {
  const v = toBigInt(n, what);
  if (v < min || v > max) {
    throw EncodeError.invalidValue(`${what}: ${v} is out of range [${min}, ${max}]`);
  }
  return v;
}

/**
 * Writes CBOR items to a sink, in call order and without buffering.
 *
 * Container headers do not track how many items follow; the caller (usually
 * a codec) is responsible for writing exactly the declared number.
 */
export class Encoder {
  readonly sink: Sink;
  private readonly scratch = new Uint8Array(9);
  private readonly view = new DataView(this.scratch.buffer);

  constructor(sink: Sink) {
    this.sink = sink;
  }

  private head(major: Major, n: bigint): void {
    const ai = minimalInfo(n);
    const s = this.scratch;
    s[0] = initial(major, ai);
    switch (ai) {
      case AI_U8: s[1] = Number(n); this.flush(2); return;
      case AI_U16: this.view.setUint16(1, Number(n)); this.flush(3); return;
      case AI_U32: this.view.setUint32(1, Number(n)); this.flush(5); return;
      case AI_U64: this.view.setBigUint64(1, n); this.flush(9); return;
      default: this.flush(1);
    }
  }

  private flush(n: number): void {
    this.sink.write(this.scratch.subarray(0, n));
  }

  private byte(b: number): this {
    this.scratch[0] = b;
    this.flush(1);
    return this;
  }

  unsigned(n: number | bigint): this {
    this.head(Major.Unsigned, checkRange(n, 0n, U64_MAX, "unsigned"));
    return this;
  }

  /** Writes a negative integer; the wire argument is `-1 - n`. */
  negative(n: number | bigint): this {
    const v = checkRange(n, -U64_MAX - 1n, -1n, "negative");
    this.head(Major.Negative, -1n - v);
    return this;
  }

  /** Any integer in the CBOR range [-2^64, 2^64 - 1]. */
  int(n: number | bigint): this {
    const v = checkRange(n, -U64_MAX - 1n, U64_MAX, "int");
    if (v >= 0n) this.head(Major.Unsigned, v);
    else this.head(Major.Negative, -1n - v);
    return this;
  }

  u8(n: number): this { return this.unsigned(checkRange(n, 0n, 0xffn, "u8")); }
  u16(n: number): this { return this.unsigned(checkRange(n, 0n, 0xffffn, "u16")); }
  u32(n: number): this { return this.unsigned(checkRange(n, 0n, 0xffffffffn, "u32")); }
  u64(n: number | bigint): this { return this.unsigned(n); }

  i8(n: number): this { return this.int(checkRange(n, -0x80n, 0x7fn, "i8")); }
  i16(n: number): this { return this.int(checkRange(n, -0x8000n, 0x7fffn, "i16")); }
  i32(n: number): this { return this.int(checkRange(n, -0x80000000n, 0x7fffffffn, "i32")); }
  i64(n: number | bigint): this {
    return this.int(checkRange(n, -0x8000000000000000n, 0x7fffffffffffffffn, "i64"));
  }

  bytes(v: Uint8Array): this {
    this.head(Major.Bytes, BigInt(v.length));
    this.sink.write(v);
    return this;
  }

  text(v: string): this {
    const enc = _te.encode(v);
    this.head(Major.Text, BigInt(enc.length));
    this.sink.write(enc);
    return this;
  }

  array(len: number): this {
    this.head(Major.Array, checkRange(len, 0n, U64_MAX, "array length"));
    return this;
  }

  map(len: number): this {
    this.head(Major.Map, checkRange(len, 0n, U64_MAX, "map length"));
    return this;
  }

  beginArray(): this { return this.byte(initial(Major.Array, AI_INDEFINITE)); }
  beginMap(): this { return this.byte(initial(Major.Map, AI_INDEFINITE)); }
  beginBytes(): this { return this.byte(initial(Major.Bytes, AI_INDEFINITE)); }
  beginText(): this { return this.byte(initial(Major.Text, AI_INDEFINITE)); }

  /** Terminates the innermost indefinite-length item. */
  end(): this { return this.byte(BREAK); }

  tag(n: number | bigint): this {
    this.head(Major.Tag, checkRange(n, 0n, U64_MAX, "tag"));
    return this;
  }

  bool(v: boolean): this { return this.byte(initial(Major.Simple, v ? SIMPLE_TRUE : SIMPLE_FALSE)); }
  null(): this { return this.byte(initial(Major.Simple, SIMPLE_NULL)); }
  undefined(): this { return this.byte(initial(Major.Simple, SIMPLE_UNDEFINED)); }

  simple(n: number): this {
    if (!Number.isInteger(n) || n < 0 || n > 255 || (n >= 24 && n < 32)) {
      throw EncodeError.invalidValue(`invalid simple value ${n}`);
    }
    if (n < 24) return this.byte(initial(Major.Simple, n));
    this.scratch[0] = initial(Major.Simple, AI_U8);
    this.scratch[1] = n;
    this.flush(2);
    return this;
  }

  f16(v: number): this {
    this.scratch[0] = F16;
    this.view.setUint16(1, toHalfBits(v));
    this.flush(3);
    return this;
  }

  f32(v: number): this {
    this.scratch[0] = F32;
    this.view.setFloat32(1, v);
    this.flush(5);
    return this;
  }

  f64(v: number): this {
    this.scratch[0] = F64;
    this.view.setFloat64(1, v);
    this.flush(9);
    return this;
  }

  /** Writes a float in the shortest width that represents it exactly. */
  float(v: number): this {
    if (isHalfExact(v)) return this.f16(v);
    if (isSingleExact(v)) return this.f32(v);
    return this.f64(v);
  }

  encode<T, C>(value: T, codec: Encode<T, C>, ctx: C): this {
    codec.encode(value, this, ctx);
    return this;
  }
}
