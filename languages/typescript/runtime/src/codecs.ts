import type { Codec } from "./codec.js";
import type { Decoder } from "./decoder.js";
import type { Encoder } from "./encoder.js";
import { DecodeError, EncodeError } from "./errors.js";
import { Major, Tag, Type } from "./grammar.js";

// --- Scalars ---

function scalar<T>(enc: (e: Encoder, v: T) => void, dec: (d: Decoder) => T): Codec<T> {
  return {
    encode: (v, e) => enc(e, v),
    decode: (d) => dec(d),
  };
}

export const bool: Codec<boolean> = scalar((e, v) => e.bool(v), (d) => d.bool());

export const u8: Codec<number> = scalar((e, v) => e.u8(v), (d) => d.u8());
export const u16: Codec<number> = scalar((e, v) => e.u16(v), (d) => d.u16());
export const u32: Codec<number> = scalar((e, v) => e.u32(v), (d) => d.u32());
export const u64: Codec<bigint> = scalar((e, v) => e.u64(v), (d) => d.u64());

export const i8: Codec<number> = scalar((e, v) => e.i8(v), (d) => d.i8());
export const i16: Codec<number> = scalar((e, v) => e.i16(v), (d) => d.i16());
export const i32: Codec<number> = scalar((e, v) => e.i32(v), (d) => d.i32());
export const i64: Codec<bigint> = scalar((e, v) => e.i64(v), (d) => d.i64());

/** Any CBOR integer. */
export const int: Codec<bigint> = scalar((e, v) => e.int(v), (d) => d.int());

function safeNumber(d: Decoder, read: () => bigint, target: string): number {
  const at = d.position;
  const v = read();
  if (v > BigInt(Number.MAX_SAFE_INTEGER) || v < BigInt(Number.MIN_SAFE_INTEGER)) {
    d.setPosition(at);
    throw DecodeError.overflow(v, target, at);
  }
  return Number(v);
}

/** u64 on the wire, limited to safe integers in memory. */
export const u64Number: Codec<number> = scalar(
  (e, v) => e.u64(v),
  (d) => safeNumber(d, () => d.u64(), "safe integer"),
);

export const i64Number: Codec<number> = scalar(
  (e, v) => e.i64(v),
  (d) => safeNumber(d, () => d.i64(), "safe integer"),
);

export const f16: Codec<number> = scalar((e, v) => e.f16(v), (d) => d.f16());
export const f32: Codec<number> = scalar((e, v) => e.f32(v), (d) => d.f32());
export const f64: Codec<number> = scalar((e, v) => e.f64(v), (d) => d.f64());

/** Shortest exact width on encode, any width on decode. */
export const float: Codec<number> = scalar((e, v) => e.float(v), (d) => d.float());

export const text: Codec<string> = scalar((e, v) => e.text(v), (d) => d.text());
export const bytes: Codec<Uint8Array> = scalar((e, v) => e.bytes(v), (d) => d.bytes());

// --- Combinators ---

/** `null` on the wire for a missing value. */
export function nullable<T, C>(inner: Codec<T, C>): Codec<T | null, C> {
  return {
    encode(v, e, ctx) {
      if (v === null) e.null();
      else inner.encode(v, e, ctx);
    },
    decode(d, ctx) {
      if (d.datatype() === Type.Null) return d.null();
      return inner.decode(d, ctx);
    },
  };
}

/** Calls `each` once per element of a definite or indefinite array. */
export function readArray(d: Decoder, each: (i: number) => void): number {
  return d.nested(() => {
    const len = d.array();
    if (len === null) {
      let i = 0;
      while (!d.isBreak()) each(i++);
      d.readBreak();
      return i;
    }
    for (let i = 0; i < len; i++) each(i);
    return len;
  });
}

/** Calls `each` once per entry of a definite or indefinite map; `each` reads key and value. */
export function readMap(d: Decoder, each: (i: number) => void): number {
  return d.nested(() => {
    const len = d.map();
    if (len === null) {
      let i = 0;
      while (!d.isBreak()) each(i++);
      d.readBreak();
      return i;
    }
    for (let i = 0; i < len; i++) each(i);
    return len;
  });
}

export function array<T, C>(item: Codec<T, C>): Codec<T[], C> {
  return {
    encode(v, e, ctx) {
      e.array(v.length);
      for (const x of v) item.encode(x, e, ctx);
    },
    decode(d, ctx) {
      const out: T[] = [];
      readArray(d, () => {
        out.push(item.decode(d, ctx));
      });
      return out;
    },
  };
}

/** An array whose length is part of the type. */
export function fixedArray<T, C>(item: Codec<T, C>, length: number): Codec<T[], C> {
  const inner = array(item);
  return {
    encode(v, e, ctx) {
      if (v.length !== length) {
        throw EncodeError.invalidValue(`expected array of length ${length}, got ${v.length}`);
      }
      inner.encode(v, e, ctx);
    },
    decode(d, ctx) {
      const at = d.position;
      const v = inner.decode(d, ctx);
      if (v.length !== length) {
        d.setPosition(at);
        throw DecodeError.typeMismatch(`array of length ${v.length}`, `array of length ${length}`, at);
      }
      return v;
    },
  };
}

export function map<K, V, C>(key: Codec<K, C>, value: Codec<V, C>): Codec<Map<K, V>, C> {
  return {
    encode(v, e, ctx) {
      e.map(v.size);
      for (const [k, x] of v) {
        key.encode(k, e, ctx);
        value.encode(x, e, ctx);
      }
    },
    decode(d, ctx) {
      const out = new Map<K, V>();
      readMap(d, () => {
        const k = key.decode(d, ctx);
        out.set(k, value.decode(d, ctx));
      });
      return out;
    },
  };
}

/** A map with text keys, held as a plain object. */
export function record<V, C>(value: Codec<V, C>): Codec<Record<string, V>, C> {
  return {
    encode(v, e, ctx) {
      const keys = Object.keys(v);
      e.map(keys.length);
      for (const k of keys) {
        e.text(k);
        value.encode(v[k], e, ctx);
      }
    },
    decode(d, ctx) {
      const out: Record<string, V> = {};
      readMap(d, () => {
        const k = d.text();
        Object.defineProperty(out, k, {
          value: value.decode(d, ctx),
          enumerable: true,
          writable: true,
          configurable: true,
        });
      });
      return out;
    },
  };
}

export function set<T, C>(item: Codec<T, C>): Codec<Set<T>, C> {
  const inner = array(item);
  return {
    encode: (v, e, ctx) => inner.encode([...v], e, ctx),
    decode: (d, ctx) => new Set(inner.decode(d, ctx)),
  };
}

/** Wraps a value in a fixed tag number; any other tag fails to decode. */
export function tagged<T, C>(tag: number, inner: Codec<T, C>): Codec<T, C> {
  return {
    encode(v, e, ctx) {
      e.tag(tag);
      inner.encode(v, e, ctx);
    },
    decode(d, ctx) {
      const at = d.position;
      const t = d.tag();
      if (t !== BigInt(tag)) {
        d.setPosition(at);
        throw DecodeError.typeMismatch(`tag ${t}`, `tag ${tag}`, at);
      }
      return d.nested(() => inner.decode(d, ctx));
    },
  };
}

/** Epoch-based date/time (tag 1), seconds as integer or float. */
export const timestamp: Codec<Date> = {
  encode(v, e) {
    const ms = v.getTime();
    if (Number.isNaN(ms)) throw EncodeError.invalidValue("invalid date");
    e.tag(Tag.Timestamp);
    if (ms % 1000 === 0) e.int(ms / 1000);
    else e.f64(ms / 1000);
  },
  decode(d) {
    const at = d.position;
    const t = d.tag();
    if (t !== BigInt(Tag.Timestamp)) {
      d.setPosition(at);
      throw DecodeError.typeMismatch(`tag ${t}`, `tag ${Tag.Timestamp}`, at);
    }
    try {
      const date = d.nested(() => {
        const kind = d.peekMajor();
        const secs = kind === Major.Unsigned || kind === Major.Negative ? Number(d.int()) : d.float();
        return new Date(secs * 1000);
      });
      if (Number.isNaN(date.getTime())) throw DecodeError.invalid("timestamp outside the Date range", at);
      return date;
    } catch (err) {
      d.setPosition(at);
      throw err;
    }
  },
};

/** A span of time: whole seconds plus the nanoseconds below one second. */
export interface Duration {
  secs: bigint;
  nanos: number;
}

/** Writes `{0: secs, 1: nanos}`. */
export const duration: Codec<Duration> = {
  encode(v, e) {
    if (!Number.isInteger(v.nanos) || v.nanos < 0 || v.nanos >= 1e9) {
      throw EncodeError.invalidValue(`duration: ${v.nanos} nanoseconds is out of range`);
    }
    e.map(2).u8(0).u64(v.secs).u8(1).u32(v.nanos);
  },
  decode(d) {
    const at = d.position;
    const out: { secs?: bigint; nanos?: number } = {};
    try {
      readMap(d, () => {
        const k = d.u32();
        if (k === 0) out.secs = d.u64();
        else if (k === 1) out.nanos = d.u32();
        else d.skip();
      });
      if (out.secs === undefined) throw DecodeError.missingField(0, "Duration.secs");
      if (out.nanos === undefined) throw DecodeError.missingField(1, "Duration.nanos");
      if (out.nanos >= 1e9) throw DecodeError.invalid(`duration: ${out.nanos} nanoseconds is out of range`, at);
      return { secs: out.secs, nanos: out.nanos };
    } catch (err) {
      d.setPosition(at);
      throw err;
    }
  },
};

/** Defers codec lookup to first use, for recursive types. */
export function lazy<T, C>(get: () => Codec<T, C>): Codec<T, C> {
  let cached: Codec<T, C> | undefined;
  const resolve = (): Codec<T, C> => (cached ??= get());
  return {
    encode: (v, e, ctx) => resolve().encode(v, e, ctx),
    decode: (d, ctx) => resolve().decode(d, ctx),
  };
}

/**
 * Untagged alternatives. Encoding picks the first alternative whose guard
 * accepts the value; decoding tries each alternative in order, rewinding
 * the cursor after every failed attempt.
 */
export function oneOf<T, C>(
  ...alternatives: { is: (v: T) => boolean; codec: Codec<T, C> }[]
): Codec<T, C> {
  return {
    encode(v, e, ctx) {
      for (const alt of alternatives) {
        if (alt.is(v)) {
          alt.codec.encode(v, e, ctx);
          return;
        }
      }
      throw EncodeError.invalidValue("value matches no alternative");
    },
    decode(d, ctx) {
      const at = d.position;
      for (const alt of alternatives) {
        const r = d.attempt(() => ({ value: alt.codec.decode(d, ctx) }));
        if (r !== undefined) return r.value;
      }
      throw new DecodeError("type-mismatch", `${d.datatype()} matches no alternative`, at);
    },
  };
}
