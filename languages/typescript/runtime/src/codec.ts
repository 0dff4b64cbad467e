import { Decoder, type DecoderOptions } from "./decoder.js";
import { Encoder } from "./encoder.js";
import { DecodeError } from "./errors.js";
import { ArraySink, type Sink } from "./sink.js";

/**
 * A type that can write itself as CBOR. `ctx` is supplied by the caller and
 * passed through unchanged to nested codecs.
 */
export interface Encode<T, C = unknown> {
  encode(value: T, e: Encoder, ctx: C): void;
}

export interface Decode<T, C = unknown> {
  decode(d: Decoder, ctx: C): T;
}

export interface Codec<T, C = unknown> extends Encode<T, C>, Decode<T, C> {}

/** The value type of a codec. */
export type Infer<K> = K extends Decode<infer T, never> ? T : never;

export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: DecodeError };

export function encode<T>(value: T, codec: Encode<T, undefined>): Uint8Array;
export function encode<T, C>(value: T, codec: Encode<T, C>, ctx: C): Uint8Array;
export function encode<T, C>(value: T, codec: Encode<T, C | undefined>, ctx?: C): Uint8Array {
  const sink = new ArraySink();
  codec.encode(value, new Encoder(sink), ctx);
  return sink.toBytes();
}

/** Encode into an existing sink, e.g. a `SliceSink` over a fixed buffer. */
export function encodeInto<T, C>(value: T, codec: Encode<T, C>, sink: Sink, ctx: C): void {
  codec.encode(value, new Encoder(sink), ctx);
}

export function decode<T>(bytes: Uint8Array, codec: Decode<T, undefined>): T;
export function decode<T, C>(bytes: Uint8Array, codec: Decode<T, C>, ctx: C, options?: DecoderOptions): T;
export function decode<T, C>(
  bytes: Uint8Array,
  codec: Decode<T, C | undefined>,
  ctx?: C,
  options?: DecoderOptions,
): T {
  return new Decoder(bytes, options).decode(codec, ctx);
}

/** Like `decode`, but returns a `DecodeError` instead of throwing it. */
export function safeDecode<T>(bytes: Uint8Array, codec: Decode<T, undefined>): DecodeResult<T>;
export function safeDecode<T, C>(
  bytes: Uint8Array,
  codec: Decode<T, C>,
  ctx: C,
  options?: DecoderOptions,
): DecodeResult<T>;
export function safeDecode<T, C>(
  bytes: Uint8Array,
  codec: Decode<T, C | undefined>,
  ctx?: C,
  options?: DecoderOptions,
): DecodeResult<T> {
  try {
    return { ok: true, value: new Decoder(bytes, options).decode(codec, ctx) };
  } catch (err) {
    if (err instanceof DecodeError) return { ok: false, error: err };
    throw err;
  }
}
