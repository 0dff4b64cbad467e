import { describe, expect, test } from "vitest";
import { DecodeError, diagnostic, formatFloat } from "../src/index.js";

const b = (...xs: number[]) => Uint8Array.from(xs);

describe("diagnostic", () => {
  test("scalars", () => {
    expect(diagnostic(b(0x01, 0x20, 0x3b, 255, 255, 255, 255, 255, 255, 255, 255))).toBe(
      "1\n-1\n-18446744073709551616",
    );
    expect(diagnostic(b(0xf5, 0xf6, 0xf7, 0xf0))).toBe("true\nnull\nundefined\nsimple(16)");
    expect(diagnostic(b(0x42, 0x00, 0xff))).toBe("h'00ff'");
    expect(diagnostic(b(0x62, 0x22, 0x61))).toBe('"\\"a"');
  });

  test("floats always show a fraction or a special name", () => {
    expect(diagnostic(b(0xf9, 0x3e, 0x00))).toBe("1.5");
    expect(diagnostic(b(0xf9, 0x3c, 0x00))).toBe("1.0");
    expect(diagnostic(b(0xf9, 0x7e, 0x00))).toBe("NaN");
    expect(diagnostic(b(0xf9, 0xfc, 0x00))).toBe("-Infinity");
    expect(formatFloat(-0)).toBe("-0.0");
    expect(formatFloat(1e21)).toBe("1e+21");
  });

  test("containers and tags", () => {
    expect(diagnostic(b(0x82, 0x01, 0x02))).toBe("[1, 2]");
    expect(diagnostic(b(0x9f, 0x01, 0x02, 0xff))).toBe("[_ 1, 2]");
    expect(diagnostic(b(0x80))).toBe("[]");
    expect(diagnostic(b(0xa1, 0x01, 0x61, 0x61))).toBe('{1: "a"}');
    expect(diagnostic(b(0xbf, 0x61, 0x61, 0x80, 0xff))).toBe('{_ "a": []}');
    expect(diagnostic(b(0xc1, 0x1a, 0x51, 0x4b, 0x67, 0xb0))).toBe("1(1363896240)");
  });

  test("indefinite strings list their chunks", () => {
    expect(diagnostic(b(0x5f, 0x41, 0x01, 0x41, 0x02, 0xff))).toBe("(_ h'01', h'02')");
    expect(diagnostic(b(0x7f, 0x61, 0x61, 0x61, 0x62, 0xff))).toBe('(_ "a", "b")');
  });

  test("indented layout", () => {
    expect(diagnostic(b(0x82, 0x01, 0x81, 0x02), { indent: 2 })).toBe("[\n  1,\n  [\n    2\n  ]\n]");
  });

  test("malformed input", () => {
    expect(() => diagnostic(b(0xff))).toThrow(DecodeError);
    expect(() => diagnostic(b(0x82, 0x01))).toThrow(DecodeError);
    expect(() => diagnostic(b(0x81, 0x81, 0x80), { maxDepth: 1 })).toThrow("nesting exceeds maximum depth 1");
  });
});
