export {
  Major,
  Type,
  Tag,
  BREAK,
  SIMPLE_FALSE,
  SIMPLE_TRUE,
  SIMPLE_NULL,
  SIMPLE_UNDEFINED,
  typeOf,
} from "./grammar.js";

export { Encoder } from "./encoder.js";
export { Decoder, DEFAULT_MAX_DEPTH } from "./decoder.js";
export type { DecoderOptions } from "./decoder.js";
export { ArraySink, SliceSink } from "./sink.js";
export type { Sink } from "./sink.js";

export { DecodeError, EncodeError, isDecodeError } from "./errors.js";
export type { DecodeErrorKind, EncodeErrorKind } from "./errors.js";

export { encode, encodeInto, decode, safeDecode } from "./codec.js";
export type { Encode, Decode, Codec, Infer, DecodeResult } from "./codec.js";

export * as codecs from "./codecs.js";
export { readArray, readMap } from "./codecs.js";
export type { Duration } from "./codecs.js";

export {
  struct,
  field,
  optional,
  union,
  variant,
  unit,
  enumeration,
  valueEquals,
} from "./derive.js";
export type { Field, FieldOptions, Fields, StructOptions, VariantCodec, Variants } from "./derive.js";

export { diagnostic, formatFloat } from "./diagnostic.js";
export type { DiagnosticOptions } from "./diagnostic.js";

export { toHalfBits, fromHalfBits } from "./float16.js";
