import type { Decl, FieldDecl, Literal, Primitive, Schema, TypeExpr } from "./ast.js";
import { type DeclTable, integerLiteral, underlying } from "./check.js";
import { SchemaError } from "./errors.js";
import { pascal } from "./parser.js";

export interface EmitOptions {
  /** Module the generated code imports the runtime from. */
  runtimeImport?: string;
  /** Represent u64 and i64 as `number` (limited to safe integers) instead of `bigint`. */
  int64AsNumber?: boolean;
}

export const DEFAULT_RUNTIME_IMPORT = "@picocbor/runtime";

const TS_TYPES: Record<Primitive, string> = {
  bool: "boolean",
  u8: "number",
  u16: "number",
  u32: "number",
  u64: "bigint",
  i8: "number",
  i16: "number",
  i32: "number",
  i64: "bigint",
  int: "bigint",
  f16: "number",
  f32: "number",
  f64: "number",
  text: "string",
  bytes: "Uint8Array",
  timestamp: "Date",
};

class Emitter {
  private readonly schema: Schema;
  private readonly decls: DeclTable;
  private readonly options: EmitOptions;
  private readonly out: string[] = [];
  /** Enums come first: their members are read while later codecs are built. */
  private readonly ordered: Decl[];
  private readonly order = new Map<string, number>();
  private current = 0;

  constructor(schema: Schema, decls: DeclTable, options: EmitOptions) {
    this.schema = schema;
    this.decls = decls;
    this.options = options;
    this.ordered = [...schema.decls.filter((d) => d.kind === "enum"), ...schema.decls.filter((d) => d.kind !== "enum")];
    this.ordered.forEach((d, i) => this.order.set(d.name, i));
  }

  private is64AsNumber(p: Primitive): boolean {
    return this.options.int64AsNumber === true && (p === "u64" || p === "i64");
  }

  private tsType(t: TypeExpr): string {
    switch (t.kind) {
      case "primitive":
        return this.is64AsNumber(t.name) ? "number" : TS_TYPES[t.name];
      case "array": {
        const item = this.tsType(t.item);
        return item.includes(" | ") ? `(${item})[]` : `${item}[]`;
      }
      case "map":
        return `Map<${this.tsType(t.key)}, ${this.tsType(t.value)}>`;
      case "set":
        return `Set<${this.tsType(t.item)}>`;
      case "nullable": {
        const inner = this.tsType(t.inner);
        return inner.endsWith(" | null") ? inner : `${inner} | null`;
      }
      case "tagged":
        return this.tsType(t.inner);
      case "ref":
        return t.name;
    }
  }

  private codec(t: TypeExpr): string {
    switch (t.kind) {
      case "primitive":
        if (this.is64AsNumber(t.name)) return `cbor.codecs.${t.name}Number`;
        return `cbor.codecs.${t.name}`;
      case "array":
        return t.length === undefined
          ? `cbor.codecs.array(${this.codec(t.item)})`
          : `cbor.codecs.fixedArray(${this.codec(t.item)}, ${t.length})`;
      case "map":
        return `cbor.codecs.map(${this.codec(t.key)}, ${this.codec(t.value)})`;
      case "set":
        return `cbor.codecs.set(${this.codec(t.item)})`;
      case "nullable":
        return `cbor.codecs.nullable(${this.codec(t.inner)})`;
      case "tagged":
        return `cbor.codecs.tagged(${t.tag}, ${this.codec(t.inner)})`;
      case "ref": {
        const at = this.order.get(t.name) ?? Infinity;
        // Declarations at or after this one are not initialized yet.
        return at < this.current ? `${t.name}Codec` : `cbor.codecs.lazy(() => ${t.name}Codec)`;
      }
    }
  }

  private literal(f: FieldDecl, lit: Literal): string {
    const target = underlying(f.type, this.decls);
    switch (lit.kind) {
      case "string":
        return JSON.stringify(lit.value);
      case "bool":
        return String(lit.value);
      case "name":
        if (target.kind !== "enum") throw new SchemaError(`unexpected name "${lit.value}"`, lit.at, this.schema.file);
        return `${target.name}.${pascal(lit.value)}`;
      case "number": {
        if (target.kind !== "primitive" || TS_TYPES[target.name] !== "bigint") return lit.raw;
        if (!this.is64AsNumber(target.name)) return `${lit.raw}n`;
        const n = integerLiteral(lit.raw);
        if (n === undefined || n > BigInt(Number.MAX_SAFE_INTEGER) || n < BigInt(Number.MIN_SAFE_INTEGER)) {
          throw new SchemaError(`default ${lit.raw} is not a safe integer`, lit.at, this.schema.file);
        }
        return lit.raw;
      }
    }
  }

  private line(s = ""): void {
    this.out.push(s);
  }

  private helpers(name: string): void {
    this.line();
    this.line(`export function encode${name}(value: ${name}): Uint8Array {`);
    this.line(`  return cbor.encode(value, ${name}Codec);`);
    this.line(`}`);
    this.line();
    this.line(`export function decode${name}(bytes: Uint8Array, options?: cbor.DecoderOptions): ${name} {`);
    this.line(`  return cbor.decode(bytes, ${name}Codec, undefined, options);`);
    this.line(`}`);
  }

  private decl(d: Decl): void {
    this.line();
    switch (d.kind) {
      case "alias":
        this.line(`export type ${d.name} = ${this.tsType(d.type)};`);
        this.line(`export const ${d.name}Codec: cbor.Codec<${d.name}> = ${this.codec(d.type)};`);
        break;

      case "enum": {
        this.line(`export enum ${d.name} {`);
        for (const m of d.members) this.line(`  ${pascal(m.name)} = ${m.index},`);
        this.line(`}`);
        this.line();
        const members = d.members.map((m) => `${d.name}.${pascal(m.name)}`).join(", ");
        this.line(`export const ${d.name}Codec: cbor.Codec<${d.name}> = cbor.enumeration([${members}]);`);
        break;
      }

      case "struct": {
        this.line(`export interface ${d.name} {`);
        for (const f of d.fields) {
          const t = this.tsType(f.type);
          this.line(`  ${f.name}: ${f.optional && !t.endsWith(" | null") ? `${t} | null` : t};`);
        }
        this.line(`}`);
        this.line();
        this.line(`export const ${d.name}Codec: cbor.Codec<${d.name}> = cbor.struct<${d.name}>(`);
        this.line(`  {`);
        for (const f of d.fields) {
          const codec = this.codec(f.type);
          if (f.optional) this.line(`    ${f.name}: cbor.optional(${f.index}, ${codec}),`);
          else if (f.default) this.line(`    ${f.name}: cbor.field(${f.index}, ${codec}, { default: ${this.literal(f, f.default)} }),`);
          else this.line(`    ${f.name}: cbor.field(${f.index}, ${codec}),`);
        }
        this.line(`  },`);
        const encoding = d.encoding === "array" ? `encoding: "array", ` : "";
        this.line(`  { ${encoding}name: ${JSON.stringify(d.name)} },`);
        this.line(`);`);
        break;
      }

      case "union": {
        this.line(`export type ${d.name} =`);
        d.variants.forEach((v, i) => {
          const end = i === d.variants.length - 1 ? ";" : "";
          const value = v.payload ? `; value: ${this.tsType(v.payload)}` : "";
          this.line(`  | { tag: ${JSON.stringify(v.name)}${value} }${end}`);
        });
        this.line();
        this.line(`export const ${d.name}Codec: cbor.Codec<${d.name}> = cbor.union<${d.name}>(`);
        this.line(`  {`);
        for (const v of d.variants) {
          const codec = v.payload ? `cbor.variant(${v.index}, ${this.codec(v.payload)})` : `cbor.unit(${v.index})`;
          this.line(`    ${v.name}: ${codec},`);
        }
        this.line(`  },`);
        this.line(`  { name: ${JSON.stringify(d.name)} },`);
        this.line(`);`);
        break;
      }
    }
    this.helpers(d.name);
  }

  run(): string {
    const from = this.schema.file ? ` from ${this.schema.file}` : "";
    this.line(`// Generated by picocbor${from}. Do not edit.`);
    this.line();
    this.line(`import * as cbor from ${JSON.stringify(this.options.runtimeImport ?? DEFAULT_RUNTIME_IMPORT)};`);
    this.ordered.forEach((d, i) => {
      this.current = i;
      this.decl(d);
    });
    return this.out.join("\n") + "\n";
  }
}

/** Render a checked schema as a TypeScript module. */
export function emit(schema: Schema, decls: DeclTable, options: EmitOptions = {}): string {
  return new Emitter(schema, decls, options).run();
}
