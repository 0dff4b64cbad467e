import { describe, expect, test } from "vitest";
import { DecodeError, type DecodeErrorKind, Decoder, Type, codecs, decode } from "../src/index.js";

const b = (...xs: number[]) => Uint8Array.from(xs);

function failure(f: () => unknown): DecodeError {
  try {
    f();
  } catch (err) {
    if (err instanceof DecodeError) return err;
    throw err;
  }
  throw new Error("expected a DecodeError");
}

function kindOf(f: () => unknown): DecodeErrorKind {
  return failure(f).kind;
}

describe("integers", () => {
  test("unsigned and negative", () => {
    expect(new Decoder(b(0x17)).unsigned()).toBe(23n);
    expect(new Decoder(b(0x18, 0x18)).unsigned()).toBe(24n);
    expect(new Decoder(b(0x20)).negative()).toBe(-1n);
    expect(new Decoder(b(0x3b, 255, 255, 255, 255, 255, 255, 255, 255)).negative()).toBe(-18446744073709551616n);
    expect(new Decoder(b(0x39, 0x01, 0xf3)).int()).toBe(-500n);
  });

  test("sized reads check their range without advancing", () => {
    const d = new Decoder(b(0x19, 0x01, 0x00));
    expect(kindOf(() => d.u8())).toBe("overflow");
    expect(d.position).toBe(0);
    expect(d.u16()).toBe(256);
    expect(d.isEnd).toBe(true);

    expect(new Decoder(b(0x38, 0x7f)).i8()).toBe(-128);
    expect(kindOf(() => new Decoder(b(0x38, 0x80)).i8())).toBe("overflow");
    expect(new Decoder(b(0x1b, 0x7f, 255, 255, 255, 255, 255, 255, 255)).i64()).toBe(9223372036854775807n);
    expect(kindOf(() => new Decoder(b(0x1b, 0x80, 0, 0, 0, 0, 0, 0, 0)).i64())).toBe("overflow");
  });

  test("type mismatch leaves the cursor in place", () => {
    const d = new Decoder(b(0x01));
    const err = failure(() => d.text());
    expect(err.kind).toBe("type-mismatch");
    expect(err.message).toBe("expected text, found u8 at offset 0");
    expect(d.position).toBe(0);
    expect(d.u8()).toBe(1);
  });

  test("truncated argument is an underflow", () => {
    const d = new Decoder(b(0x19, 0x01));
    expect(kindOf(() => d.u16())).toBe("underflow");
    expect(d.position).toBe(0);
    expect(kindOf(() => new Decoder(b()).u8())).toBe("underflow");
  });

  test("reserved and indefinite heads are invalid", () => {
    expect(kindOf(() => new Decoder(b(0x1c)).unsigned())).toBe("invalid-encoding");
    expect(kindOf(() => new Decoder(b(0x1f)).unsigned())).toBe("invalid-encoding");
    expect(kindOf(() => new Decoder(b(0xdf)).tag())).toBe("invalid-encoding");
  });
});

describe("strict mode", () => {
  test("non-minimal integers are accepted unless strict", () => {
    expect(new Decoder(b(0x18, 0x05)).u8()).toBe(5);
    expect(new Decoder(b(0x1b, 0, 0, 0, 0, 0, 0, 0, 0x05)).u64()).toBe(5n);
    const d = new Decoder(b(0x18, 0x05), { strict: true });
    expect(kindOf(() => d.u8())).toBe("non-canonical");
    expect(d.position).toBe(0);
    expect(new Decoder(b(0x18, 0x18), { strict: true }).u8()).toBe(24);
  });

  test("non-minimal lengths", () => {
    const bytes = b(0x59, 0x00, 0x02, 0x61, 0x62);
    expect([...new Decoder(bytes).bytes()]).toEqual([0x61, 0x62]);
    expect(kindOf(() => new Decoder(bytes, { strict: true }).bytes())).toBe("non-canonical");
  });

  test("floats that fit a narrower width", () => {
    const f32 = b(0xfa, 0x3f, 0xc0, 0x00, 0x00);
    expect(new Decoder(f32).f32()).toBe(1.5);
    expect(kindOf(() => new Decoder(f32, { strict: true }).f32())).toBe("non-canonical");
    const f64 = b(0xfb, 0x3f, 0xf1, 0x99, 0x99, 0x99, 0x99, 0x99, 0x9a);
    expect(new Decoder(f64, { strict: true }).f64()).toBe(1.1);
  });
});

describe("strings", () => {
  test("definite and indefinite text", () => {
    expect(new Decoder(b(0x64, 0x49, 0x45, 0x54, 0x46)).text()).toBe("IETF");
    const chunked = b(0x7f, 0x62, 0x61, 0x62, 0x61, 0x63, 0xff);
    expect(new Decoder(chunked).text()).toBe("abc");
    expect(new Decoder(chunked).textChunks()).toEqual(["ab", "c"]);
  });

  test("indefinite bytes are concatenated", () => {
    const d = new Decoder(b(0x5f, 0x41, 0x01, 0x42, 0x02, 0x03, 0xff, 0x00));
    expect([...d.bytes()]).toEqual([1, 2, 3]);
    expect(d.position).toBe(7);
  });

  test("chunks must match the outer type", () => {
    expect(kindOf(() => new Decoder(b(0x5f, 0x61, 0x61, 0xff)).bytes())).toBe("invalid-encoding");
    expect(kindOf(() => new Decoder(b(0x7f, 0x7f, 0xff, 0xff)).text())).toBe("invalid-encoding");
  });

  test("payload shorter than its length", () => {
    const d = new Decoder(b(0x43, 0x01));
    expect(kindOf(() => d.bytes())).toBe("underflow");
    expect(d.position).toBe(0);
  });

  test("invalid utf-8", () => {
    expect(kindOf(() => new Decoder(b(0x61, 0xff)).text())).toBe("utf8");
  });
});

describe("containers", () => {
  test("array and map headers", () => {
    expect(new Decoder(b(0x83, 0x01, 0x02, 0x03)).array()).toBe(3);
    expect(new Decoder(b(0x9f)).array()).toBe(null);
    expect(new Decoder(b(0xa1, 0x01, 0x02)).map()).toBe(1);
    expect(new Decoder(b(0xbf, 0xff)).map()).toBe(null);
  });

  test("declared length larger than the input", () => {
    const d = new Decoder(b(0x9a, 0xff, 0xff, 0xff, 0xff));
    expect(kindOf(() => d.array())).toBe("underflow");
    expect(d.position).toBe(0);
    expect(kindOf(() => new Decoder(b(0xa2, 0x01, 0x02)).map())).toBe("underflow");
  });

  test("indefinite and definite arrays decode to the same value", () => {
    const list = codecs.array(codecs.u8);
    expect(decode(b(0x9f, 0x01, 0x02, 0xff), list)).toEqual([1, 2]);
    expect(decode(b(0x82, 0x01, 0x02), list)).toEqual([1, 2]);
  });

  test("readBreak requires a break", () => {
    const d = new Decoder(b(0x01));
    expect(kindOf(() => d.readBreak())).toBe("type-mismatch");
  });
});

describe("simple values and floats", () => {
  test("bool, null and undefined", () => {
    const d = new Decoder(b(0xf5, 0xf4, 0xf6, 0xf7));
    expect(d.bool()).toBe(true);
    expect(d.bool()).toBe(false);
    expect(d.null()).toBe(null);
    expect(d.undefined()).toBe(undefined);
    expect(d.isEnd).toBe(true);
  });

  test("simple values", () => {
    expect(new Decoder(b(0xf0)).simple()).toBe(16);
    expect(new Decoder(b(0xf8, 0x20)).simple()).toBe(32);
    expect(kindOf(() => new Decoder(b(0xf8, 0x10)).simple())).toBe("invalid-encoding");
  });

  test("half precision specials", () => {
    expect(new Decoder(b(0xf9, 0x7c, 0x00)).f16()).toBe(Infinity);
    expect(new Decoder(b(0xf9, 0x7e, 0x00)).f16()).toBeNaN();
    expect(new Decoder(b(0xf9, 0x00, 0x01)).f16()).toBe(5.960464477539063e-8);
    expect(Object.is(new Decoder(b(0xf9, 0x80, 0x00)).f16(), -0)).toBe(true);
  });

  test("float accepts every width", () => {
    expect(new Decoder(b(0xf9, 0x3e, 0x00)).float()).toBe(1.5);
    expect(new Decoder(b(0xfa, 0x47, 0xc3, 0x50, 0x00)).float()).toBe(100000);
    expect(kindOf(() => new Decoder(b(0x01)).float())).toBe("type-mismatch");
  });

  test("tags", () => {
    const d = new Decoder(b(0xc1, 0x1a, 0x51, 0x4b, 0x67, 0xb0));
    expect(d.tag()).toBe(1n);
    expect(d.u32()).toBe(1363896240);
  });
});

describe("peeking and positions", () => {
  test("datatype does not consume", () => {
    const d = new Decoder(b(0x9f, 0xff));
    expect(d.datatype()).toBe(Type.ArrayIndef);
    expect(d.position).toBe(0);
    expect(new Decoder(b(0xf9, 0, 0)).datatype()).toBe(Type.F16);
    expect(new Decoder(b(0xc1, 0x01)).datatype()).toBe(Type.Tag);
    expect(new Decoder(b(0x38, 0x01)).datatype()).toBe(Type.I8);
    expect(new Decoder(b(0xff)).datatype()).toBe(Type.Break);
  });

  test("attempt rewinds on failure", () => {
    const d = new Decoder(b(0x01, 0x61, 0x61));
    expect(d.attempt((x) => x.text())).toBe(undefined);
    expect(d.position).toBe(0);
    expect(d.u8()).toBe(1);
    expect(d.attempt((x) => x.text())).toBe("a");
    expect(d.isEnd).toBe(true);
  });

  test("setPosition rejects offsets outside the input", () => {
    const d = new Decoder(b(0x01, 0x02));
    d.setPosition(1);
    expect(d.u8()).toBe(2);
    expect(() => d.setPosition(3)).toThrow(RangeError);
  });

  test("decode restores the cursor when a codec fails", () => {
    const d = new Decoder(b(0x82, 0x01, 0x61, 0x61));
    expect(() => d.decode(codecs.array(codecs.u8), undefined)).toThrow(DecodeError);
    expect(d.position).toBe(0);
    expect(d.remaining).toBe(4);
  });
});

describe("depth", () => {
  test("nested containers stop at maxDepth", () => {
    const deep = codecs.array(codecs.array(codecs.array(codecs.u8)));
    const bytes = b(0x81, 0x81, 0x81, 0x01);
    expect(new Decoder(bytes, { maxDepth: 3 }).decode(deep, undefined)).toEqual([[[1]]]);
    expect(kindOf(() => new Decoder(bytes, { maxDepth: 2 }).decode(deep, undefined))).toBe("depth-exceeded");
  });
});
