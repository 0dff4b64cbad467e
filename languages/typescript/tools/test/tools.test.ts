import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { display, displayFile, generate, loadConfig, parseHex, picocborPlugin } from "../src/index.js";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "picocbor-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("loadConfig", () => {
  test("resolves paths against the config directory", async () => {
    await writeFile(
      join(dir, "picocbor.config.mjs"),
      'export default { schemas: [{ schema: "schemas/a.pcb", out: "gen/a.ts", int64AsNumber: true }] };\n',
    );
    expect(await loadConfig(dir)).toEqual({
      schemas: [
        { schema: join(dir, "schemas/a.pcb"), out: join(dir, "gen/a.ts"), int64AsNumber: true, runtimeImport: undefined },
      ],
    });
  });

  test("rejects malformed configs", async () => {
    await writeFile(join(dir, "picocbor.config.mjs"), 'export default { schemas: [{ schema: "a.pcb" }] };\n');
    await expect(loadConfig(dir)).rejects.toThrow('picocbor.config.mjs: schemas[0] needs "schema" and "out" paths');
  });

  test("fails without a config file", async () => {
    await expect(loadConfig(dir)).rejects.toThrow(
      "No config file found. Create one of: picocbor.config.ts, picocbor.config.js, picocbor.config.mjs",
    );
  });
});

describe("generate", () => {
  test("writes the compiled module, creating directories", async () => {
    const schema = join(dir, "point.pcb");
    await writeFile(schema, "struct Point { 0 x: i32, 1 y: i32 }\n");
    const out = join(dir, "gen", "nested", "point.ts");

    const result = await generate({ schema, out, runtimeImport: "../runtime.js" });

    expect(result.outputPath).toBe(out);
    const written = await readFile(out, "utf-8");
    expect(written).toBe(result.source);
    expect(written.split("\n").slice(0, 3)).toEqual([
      "// Generated by picocbor from point.pcb. Do not edit.",
      "",
      'import * as cbor from "../runtime.js";',
    ]);
    expect(written).toContain("export interface Point {\n  x: number;\n  y: number;\n}");
  });

  test("reports schema errors with the file name", async () => {
    const schema = join(dir, "bad.pcb");
    await writeFile(schema, "struct A { 0 x: Missing }\n");
    await expect(generate({ schema, out: join(dir, "bad.ts") })).rejects.toThrow('bad.pcb:1:17: unknown type "Missing"');
  });
});

describe("display", () => {
  test("prints one item per line", () => {
    expect(display(Uint8Array.from([0x01, 0x82, 0x61, 0x61, 0xf5, 0xc1, 0x1a, 0x51, 0x4b, 0x67, 0xb0]))).toBe(
      '1\n["a", true]\n1(1363896240)',
    );
  });

  test("reads hex input", async () => {
    const file = join(dir, "data.hex");
    await writeFile(file, "a1 01\n 63 66 6f 6f\n");
    expect(await displayFile(file, { hex: true })).toBe('{1: "foo"}');
  });

  test("reads binary input", async () => {
    const file = join(dir, "data.cbor");
    await writeFile(file, Uint8Array.from([0x9f, 0x01, 0x02, 0xff]));
    expect(await displayFile(file)).toBe("[_ 1, 2]");
    expect(await displayFile(file, { indent: 2 })).toBe("[_\n  1,\n  2\n]");
  });

  test("rejects malformed hex", () => {
    expect(() => parseHex("abc")).toThrow("input is not a hex string");
    expect(() => parseHex("zz")).toThrow("input is not a hex string");
    expect([...parseHex("00 ff 10")]).toEqual([0x00, 0xff, 0x10]);
  });
});

describe("vite plugin", () => {
  test("compiles .pcb modules and ignores everything else", async () => {
    const schema = join(dir, "color.pcb");
    await writeFile(schema, "enum Color { 0 red }\n");
    const plugin = picocborPlugin({ runtimeImport: "rt" });

    expect(plugin.name).toBe("picocbor");
    expect(plugin.transform("", join(dir, "main.ts"))).toBeUndefined();
    const result = plugin.transform("", schema);
    expect(result?.map).toBeNull();
    expect(result?.code).toContain('import * as cbor from "rt";');
    expect(result?.code).toContain("export const ColorCodec: cbor.Codec<Color> = cbor.enumeration([Color.Red]);");
  });
});
