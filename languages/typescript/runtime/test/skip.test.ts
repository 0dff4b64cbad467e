import { describe, expect, test } from "vitest";
import { ArraySink, type Codec, DecodeError, Decoder, Encoder, codecs } from "../src/index.js";

function written(f: (e: Encoder) => void): Uint8Array {
  const sink = new ArraySink();
  f(new Encoder(sink));
  return sink.toBytes();
}

function skipped(bytes: Uint8Array, maxDepth?: number): number {
  const d = new Decoder(bytes, { maxDepth });
  d.skip();
  return d.position;
}

function nestedArrays(n: number): Uint8Array {
  const out = new Uint8Array(n);
  out.fill(0x81, 0, n - 1);
  out[n - 1] = 0x80;
  return out;
}

const deep: Codec<unknown[]> = codecs.array(codecs.lazy(() => deep));

describe("skip", () => {
  test("consumes exactly one item", () => {
    const items = [
      written((e) => e.u64(0xffffffffffffffffn)),
      written((e) => e.text("hello")),
      written((e) => e.array(3).u8(1).array(2).u8(2).u8(3).map(1).text("a").bytes(new Uint8Array([0]))),
      written((e) => e.beginMap().text("a").beginArray().u8(1).tag(1).u8(2).end().end()),
      written((e) => e.beginText().text("ab").text("c").end()),
      written((e) => e.beginBytes().end()),
      written((e) => e.f16(1.5)),
      written((e) => e.f32(100000)),
      written((e) => e.f64(1.1)),
      written((e) => e.simple(200)),
      written((e) => e.tag(55799).tag(1).null()),
    ];
    for (const item of items) {
      const withTrailer = new Uint8Array(item.length + 1);
      withTrailer.set(item);
      withTrailer[item.length] = 0x2a;
      expect(skipped(withTrailer)).toBe(item.length);
    }
  });

  test("ends where a full decode ends", () => {
    const nested = codecs.array(codecs.array(codecs.u8));
    const bytes = written((e) => e.beginArray().array(2).u8(1).u8(2).beginArray().u8(3).end().end().u8(9));
    const d = new Decoder(bytes);
    expect(d.decode(nested, undefined)).toEqual([[1, 2], [3]]);
    expect(d.position).toBe(skipped(bytes));
    expect(d.u8()).toBe(9);
  });

  test("shares the depth limit with decoding", () => {
    expect(skipped(nestedArrays(128))).toBe(128);
    expect(new Decoder(nestedArrays(128)).decode(deep, undefined)).toHaveLength(1);

    const tooDeep = nestedArrays(129);
    const d = new Decoder(tooDeep);
    expect(() => d.skip()).toThrow(DecodeError);
    expect(d.position).toBe(0);
    try {
      new Decoder(tooDeep).decode(deep, undefined);
    } catch (err) {
      expect(err).toBeInstanceOf(DecodeError);
      if (err instanceof DecodeError) expect(err.kind).toBe("depth-exceeded");
    }
  });

  test("counts tags as a nesting level", () => {
    const bytes = written((e) => e.tag(1).tag(2).u8(0));
    expect(skipped(bytes, 2)).toBe(bytes.length);
    expect(() => skipped(bytes, 1)).toThrow(DecodeError);
  });

  test("rejects malformed input without moving", () => {
    const cases: [number[], string][] = [
      [[0xff], "invalid-encoding"],
      [[0x82, 0x01], "underflow"],
      [[0x82, 0x01, 0xff], "invalid-encoding"],
      [[0xbf, 0x01, 0xff], "invalid-encoding"],
      [[0x9f, 0x01], "underflow"],
      [[0xf8, 0x10], "invalid-encoding"],
      [[0xfc], "invalid-encoding"],
    ];
    for (const [input, kind] of cases) {
      const d = new Decoder(Uint8Array.from(input));
      try {
        d.skip();
        throw new Error(`skipped ${input.join(",")}`);
      } catch (err) {
        if (!(err instanceof DecodeError)) throw err;
        expect(err.kind).toBe(kind);
      }
      expect(d.position).toBe(0);
    }
  });
});
