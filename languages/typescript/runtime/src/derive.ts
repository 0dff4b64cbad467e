import type { Codec } from "./codec.js";
import { readArray, readMap } from "./codecs.js";
import type { Decoder } from "./decoder.js";
import type { Encoder } from "./encoder.js";
import { DecodeError, EncodeError, isDecodeError } from "./errors.js";
import { Type } from "./grammar.js";

// === Structs ===

/**
 * One struct field: its wire index, its codec, and what to do when the field
 * is absent from the input or may be left out of the output.
 */
export interface Field<V, C = unknown> {
  readonly index: number;
  readonly codec: Codec<V, C>;
  /** Decode failures with an unknown variant yield `null` instead of failing. */
  readonly optional: boolean;
  /** Value for an absent field; required fields have none. */
  fallback?(): V;
  /** Whether `v` may be left out of the encoding. */
  omit(v: V): boolean;
}

export interface FieldOptions<V> {
  /** Used when the field is absent. Values equal to it are not encoded. */
  default: V;
  equals?: (a: V, b: V) => boolean;
}

/** Structural equality for the value shapes codecs produce. */
export function valueEquals(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  if (a instanceof Uint8Array && b instanceof Uint8Array) {
    return a.length === b.length && a.every((x, i) => x === b[i]);
  }
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((x, i) => valueEquals(x, b[i]));
  }
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
  return false;
}

function copyOf<V>(v: V): V {
  return typeof v === "object" && v !== null ? structuredClone(v) : v;
}

export function field<V, C = unknown>(
  index: number,
  codec: Codec<V, C>,
  options?: FieldOptions<V>,
): Field<V, C> {
  if (options === undefined) {
    return { index, codec, optional: false, omit: () => false };
  }
  const dflt = options.default;
  const equals = options.equals ?? valueEquals;
  return {
    index,
    codec,
    optional: false,
    fallback: () => copyOf(dflt),
    omit: (v) => equals(v, dflt),
  };
}

/** A field that is `null` when absent and is not encoded while `null`. */
export function optional<V, C = unknown>(index: number, codec: Codec<V, C>): Field<V | null, C> {
  return {
    index,
    codec: {
      encode(v, e, ctx) {
        if (v === null) e.null();
        else codec.encode(v, e, ctx);
      },
      decode(d, ctx) {
        if (d.datatype() === Type.Null) return d.null();
        return codec.decode(d, ctx);
      },
    },
    optional: true,
    fallback: () => null,
    omit: (v) => v === null,
  };
}

export type Fields<T, C = unknown> = { [K in keyof T]-?: Field<T[K], C> };

export interface StructOptions {
  /** "map" (default) keys every entry by index; "array" places fields by position. */
  encoding?: "map" | "array";
  /** Type name used in error messages. */
  name?: string;
}

interface Entry<T, C> {
  key: Extract<keyof T, string>;
  field: Field<unknown, C>;
}

function hasFields<T extends object>(value: object, keys: readonly string[]): value is T {
  return keys.every((k) => Object.prototype.hasOwnProperty.call(value, k));
}

export function struct<T extends object, C = unknown>(
  fields: Fields<T, C>,
  options: StructOptions = {},
): Codec<T, C> {
  const name = options.name ?? "struct";
  const entries: Entry<T, C>[] = [];
  for (const key in fields) {
    entries.push({ key, field: fields[key] });
  }
  entries.sort((a, b) => a.field.index - b.field.index);

  const byIndex = new Map<number, Entry<T, C>>();
  for (const entry of entries) {
    const { index } = entry.field;
    if (!Number.isInteger(index) || index < 0 || index > 0xffffffff) {
      throw new Error(`${name}.${entry.key}: invalid index ${index}`);
    }
    const other = byIndex.get(index);
    if (other) throw new Error(`${name}: fields ${other.key} and ${entry.key} share index ${index}`);
    byIndex.set(index, entry);
  }
  const keys = entries.map((en) => en.key);

  function encodeMap(v: T, e: Encoder, ctx: C): void {
    const present = entries.filter((en) => !en.field.omit(v[en.key]));
    e.map(present.length);
    for (const en of present) {
      e.u32(en.field.index);
      en.field.codec.encode(v[en.key], e, ctx);
    }
  }

  function encodeArray(v: T, e: Encoder, ctx: C): void {
    let len = 0;
    for (const en of entries) {
      if (!en.field.omit(v[en.key])) len = en.field.index + 1;
    }
    e.array(len);
    let i = 0;
    for (const en of entries) {
      if (en.field.index >= len) break;
      for (; i < en.field.index; i++) e.null();
      en.field.codec.encode(v[en.key], e, ctx);
      i++;
    }
  }

  function decodeField(d: Decoder, ctx: C, en: Entry<T, C>, found: Map<number, unknown>): void {
    if (!en.field.optional) {
      found.set(en.field.index, en.field.codec.decode(d, ctx));
      return;
    }
    const at = d.position;
    try {
      found.set(en.field.index, en.field.codec.decode(d, ctx));
    } catch (err) {
      if (!isDecodeError(err, "unknown-variant")) throw err;
      d.setPosition(at);
      d.skip();
      found.set(en.field.index, null);
    }
  }

  function decodeEntry(d: Decoder, ctx: C, index: number, found: Map<number, unknown>): void {
    const en = byIndex.get(index);
    if (en) decodeField(d, ctx, en, found);
    else d.skip();
  }

  return {
    encode(v, e, ctx) {
      if (options.encoding === "array") encodeArray(v, e, ctx);
      else encodeMap(v, e, ctx);
    },
    decode(d, ctx) {
      const found = new Map<number, unknown>();
      if (options.encoding === "array") {
        readArray(d, (i) => decodeEntry(d, ctx, i, found));
      } else {
        readMap(d, () => {
          const at = d.position;
          const index = d.unsigned();
          if (index > 0xffffffffn) throw DecodeError.overflow(index, "field index", at);
          decodeEntry(d, ctx, Number(index), found);
        });
      }
      const out: Record<string, unknown> = {};
      for (const en of entries) {
        if (found.has(en.field.index)) {
          out[en.key] = found.get(en.field.index);
        } else if (en.field.fallback) {
          out[en.key] = en.field.fallback();
        } else {
          throw DecodeError.missingField(en.field.index, `${name}.${en.key}`);
        }
      }
      if (!hasFields<T>(out, keys)) throw new Error(`${name}: incomplete decode`);
      return out;
    },
  };
}

// === Unions ===

/** How one variant of a union writes its payload and rebuilds itself. */
export interface VariantCodec<V, C = unknown> {
  readonly index: number;
  encodePayload(v: V, e: Encoder, ctx: C): void;
  decodePayload(d: Decoder, ctx: C): V;
}

export type Variants<T extends { tag: string }, C = unknown> = {
  [K in T["tag"]]: (tag: K) => VariantCodec<Extract<T, { tag: K }>, C>;
};

function tagsOf<T extends { tag: string }, C>(variants: Variants<T, C>): T["tag"][] {
  return Object.keys(variants).filter((k): k is T["tag"] => Object.hasOwn(variants, k));
}

/** A variant carrying a value: `{ tag, value }`. */
export function variant<P, C = unknown>(index: number, codec: Codec<P, C>) {
  return <K extends string>(tag: K): VariantCodec<{ tag: K; value: P }, C> => ({
    index,
    encodePayload: (v, e, ctx) => codec.encode(v.value, e, ctx),
    decodePayload: (d, ctx) => ({ tag, value: codec.decode(d, ctx) }),
  });
}

/** A variant without a value: `{ tag }`. Its payload is an empty array. */
export function unit(index: number) {
  return <K extends string>(tag: K): VariantCodec<{ tag: K }, unknown> => ({
    index,
    encodePayload: (_v, e) => {
      e.array(0);
    },
    decodePayload: (d) => {
      d.skip();
      return { tag };
    },
  });
}

/**
 * A discriminated union written as a two-element array of the variant index
 * and its payload.
 */
export function union<T extends { tag: string }, C = unknown>(
  variants: Variants<T, C>,
  options: { name?: string } = {},
): Codec<T, C> {
  const name = options.name ?? "union";
  const byTag = new Map<string, VariantCodec<T, C>>();
  const byIndex = new Map<number, VariantCodec<T, C>>();
  for (const tag of tagsOf(variants)) {
    const vc: VariantCodec<T, C> = variants[tag](tag);
    const other = byIndex.get(vc.index);
    if (other) throw new Error(`${name}: variants share index ${vc.index}`);
    byTag.set(tag, vc);
    byIndex.set(vc.index, vc);
  }

  return {
    encode(v, e, ctx) {
      const vc = byTag.get(v.tag);
      if (!vc) throw EncodeError.invalidValue(`${name}: unknown variant "${v.tag}"`);
      e.array(2);
      e.u32(vc.index);
      vc.encodePayload(v, e, ctx);
    },
    decode(d, ctx) {
      return d.nested(() => {
        const at = d.position;
        const len = d.array();
        if (len !== null && len !== 2) {
          throw DecodeError.typeMismatch(`array of length ${len}`, `${name} (2-element array)`, at);
        }
        const idxAt = d.position;
        const index = d.u32();
        const vc = byIndex.get(index);
        if (!vc) throw DecodeError.unknownVariant(index, idxAt);
        const value = vc.decodePayload(d, ctx);
        if (len === null) d.readBreak();
        return value;
      });
    },
  };
}

/** A numeric enum written as its bare unsigned value. */
export function enumeration<E extends number>(members: readonly E[]): Codec<E> {
  return {
    encode(v, e) {
      e.u32(v);
    },
    decode(d) {
      const at = d.position;
      const n = d.u32();
      const m = members.find((x) => x === n);
      if (m === undefined) {
        d.setPosition(at);
        throw DecodeError.unknownVariant(n, at);
      }
      return m;
    },
  };
}
