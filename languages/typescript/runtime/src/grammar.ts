// === Grammar ===

export enum Major {
  Unsigned = 0,
  Negative = 1,
  Bytes = 2,
  Text = 3,
  Array = 4,
  Map = 5,
  Tag = 6,
  Simple = 7,
}

/** Largest argument that fits in the initial byte. */
export const MAX_IMMEDIATE = 23;

export const AI_U8 = 24;
export const AI_U16 = 25;
export const AI_U32 = 26;
export const AI_U64 = 27;
export const AI_INDEFINITE = 31;

export const SIMPLE_FALSE = 20;
export const SIMPLE_TRUE = 21;
export const SIMPLE_NULL = 22;
export const SIMPLE_UNDEFINED = 23;

export const F16 = 0xf9;
export const F32 = 0xfa;
export const F64 = 0xfb;
export const BREAK = 0xff;

export const U64_MAX = 0xffffffffffffffffn;

/** The data type of an item as seen from its initial byte. */
export enum Type {
  Bool = "bool",
  Null = "null",
  Undefined = "undefined",
  U8 = "u8",
  U16 = "u16",
  U32 = "u32",
  U64 = "u64",
  I8 = "i8",
  I16 = "i16",
  I32 = "i32",
  I64 = "i64",
  F16 = "f16",
  F32 = "f32",
  F64 = "f64",
  Simple = "simple",
  Bytes = "bytes",
  BytesIndef = "indefinite bytes",
  String = "string",
  StringIndef = "indefinite string",
  Array = "array",
  ArrayIndef = "indefinite array",
  Map = "map",
  MapIndef = "indefinite map",
  Tag = "tag",
  Break = "break",
  Unknown = "unknown",
}

/** Well-known tag numbers from the IANA registry. */
export const Tag = {
  DateTime: 0,
  Timestamp: 1,
  PosBignum: 2,
  NegBignum: 3,
  Decimal: 4,
  Bigfloat: 5,
  ToBase64Url: 21,
  ToBase64: 22,
  ToBase16: 23,
  Cbor: 24,
  Uri: 32,
  Base64Url: 33,
  Base64: 34,
  Regex: 35,
  Mime: 36,
  SelfDescribed: 55799,
} as const;

export function initial(major: Major, ai: number): number {
  return (major << 5) | ai;
}

export function majorOf(byte: number): Major {
  return byte >> 5;
}

export function infoOf(byte: number): number {
  return byte & 0x1f;
}

const WIDTHS: readonly Type[][] = [
  [Type.U8, Type.U16, Type.U32, Type.U64],
  [Type.I8, Type.I16, Type.I32, Type.I64],
];

export function typeOf(byte: number): Type {
  const major = majorOf(byte);
  const ai = infoOf(byte);
  switch (major) {
    case Major.Unsigned:
    case Major.Negative:
      if (ai <= AI_U8) return WIDTHS[major][0];
      if (ai <= AI_U64) return WIDTHS[major][ai - AI_U8];
      return Type.Unknown;
    case Major.Bytes:
      if (ai === AI_INDEFINITE) return Type.BytesIndef;
      return ai <= AI_U64 ? Type.Bytes : Type.Unknown;
    case Major.Text:
      if (ai === AI_INDEFINITE) return Type.StringIndef;
      return ai <= AI_U64 ? Type.String : Type.Unknown;
    case Major.Array:
      if (ai === AI_INDEFINITE) return Type.ArrayIndef;
      return ai <= AI_U64 ? Type.Array : Type.Unknown;
    case Major.Map:
      if (ai === AI_INDEFINITE) return Type.MapIndef;
      return ai <= AI_U64 ? Type.Map : Type.Unknown;
    case Major.Tag:
      return ai <= AI_U64 ? Type.Tag : Type.Unknown;
    default:
      if (ai === SIMPLE_FALSE || ai === SIMPLE_TRUE) return Type.Bool;
      if (ai === SIMPLE_NULL) return Type.Null;
      if (ai === SIMPLE_UNDEFINED) return Type.Undefined;
      if (ai < SIMPLE_FALSE || ai === AI_U8) return Type.Simple;
      if (ai === AI_U16) return Type.F16;
      if (ai === AI_U32) return Type.F32;
      if (ai === AI_U64) return Type.F64;
      if (ai === AI_INDEFINITE) return Type.Break;
      return Type.Unknown;
  }
}

/** Number of argument bytes following an initial byte with this additional info. */
export function argumentWidth(ai: number): number {
  if (ai <= MAX_IMMEDIATE) return 0;
  if (ai === AI_U8) return 1;
  if (ai === AI_U16) return 2;
  if (ai === AI_U32) return 4;
  if (ai === AI_U64) return 8;
  return -1;
}

/** Additional info of the shortest encoding of `n`. */
export function minimalInfo(n: bigint): number {
  if (n <= 23n) return Number(n);
  if (n <= 0xffn) return AI_U8;
  if (n <= 0xffffn) return AI_U16;
  if (n <= 0xffffffffn) return AI_U32;
  return AI_U64;
}
