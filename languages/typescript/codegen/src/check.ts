import { type Decl, type FieldDecl, type Literal, type Primitive, type Schema, type TypeExpr, isPrimitive } from "./ast.js";
import { type Position, SchemaError } from "./errors.js";
import { pascal } from "./parser.js";

const RESERVED = new Set([
  "map",
  "set",
  "tag",
  "type",
  "enum",
  "struct",
  "union",
  "as",
  "true",
  "false",
  "null",
  "cbor",
]);

const INT_RANGES: Partial<Record<Primitive, [bigint, bigint]>> = {
  u8: [0n, 0xffn],
  u16: [0n, 0xffffn],
  u32: [0n, 0xffffffffn],
  u64: [0n, 0xffffffffffffffffn],
  i8: [-0x80n, 0x7fn],
  i16: [-0x8000n, 0x7fffn],
  i32: [-0x80000000n, 0x7fffffffn],
  i64: [-0x8000000000000000n, 0x7fffffffffffffffn],
  int: [-0x10000000000000000n, 0xffffffffffffffffn],
};

/** The exact integer a number literal spells, or undefined for fractions and exponents. */
export function integerLiteral(raw: string): bigint | undefined {
  if (/^-0x/i.test(raw)) return -BigInt(raw.slice(1));
  if (/^(0x[0-9a-f]+|-?\d+)$/i.test(raw)) return BigInt(raw);
  return undefined;
}

export type DeclTable = ReadonlyMap<string, Decl>;

/**
 * Validate a parsed schema: unique names and indices, resolvable references,
 * no alias cycles, and defaults that fit their field types.
 */
export function check(schema: Schema): DeclTable {
  const file = schema.file;
  const fail = (message: string, at: Position): never => {
    throw new SchemaError(message, at, file);
  };

  const decls = new Map<string, Decl>();
  for (const decl of schema.decls) {
    if (RESERVED.has(decl.name) || isPrimitive(decl.name)) fail(`"${decl.name}" is a reserved word`, decl.at);
    if (decls.has(decl.name)) fail(`duplicate declaration "${decl.name}"`, decl.at);
    decls.set(decl.name, decl);
  }
  for (const decl of schema.decls) {
    if (decls.has(`${decl.name}Codec`)) fail(`"${decl.name}Codec" clashes with the codec generated for "${decl.name}"`, decl.at);
  }

  const unique = <T extends { index: number; name: string; at: Position }>(items: T[], what: string, key = (x: T) => x.name) => {
    const indices = new Map<number, string>();
    const names = new Set<string>();
    for (const item of items) {
      const other = indices.get(item.index);
      if (other !== undefined) fail(`${what}s "${other}" and "${item.name}" share index ${item.index}`, item.at);
      if (names.has(key(item))) fail(`duplicate ${what} "${item.name}"`, item.at);
      if (item.name === "__proto__") fail(`"__proto__" cannot be used as a ${what} name`, item.at);
      indices.set(item.index, item.name);
      names.add(key(item));
    }
  };

  const resolve = (t: TypeExpr): void => {
    switch (t.kind) {
      case "primitive":
        return;
      case "ref":
        if (!decls.has(t.name)) fail(`unknown type "${t.name}"`, t.at);
        return;
      case "array":
      case "set":
        return resolve(t.item);
      case "map":
        resolve(t.key);
        return resolve(t.value);
      case "nullable":
      case "tagged":
        return resolve(t.inner);
    }
  };

  for (const decl of schema.decls) {
    switch (decl.kind) {
      case "alias":
        resolve(decl.type);
        break;
      case "enum":
        if (decl.members.length === 0) fail(`enum "${decl.name}" has no members`, decl.at);
        unique(decl.members, "member", (m) => pascal(m.name));
        break;
      case "struct":
        unique(decl.fields, "field");
        for (const f of decl.fields) {
          resolve(f.type);
          checkDefault(f, decls, fail);
        }
        break;
      case "union":
        if (decl.variants.length === 0) fail(`union "${decl.name}" has no variants`, decl.at);
        unique(decl.variants, "variant");
        for (const v of decl.variants) if (v.payload) resolve(v.payload);
        break;
    }
  }

  for (const decl of schema.decls) {
    if (decl.kind === "alias") checkAliasCycle(decl.name, decl.type, decls, [decl.name], fail);
  }

  return decls;
}

/** An alias may only refer back to itself through a container. */
function checkAliasCycle(
  root: string,
  t: TypeExpr,
  decls: DeclTable,
  path: string[],
  fail: (message: string, at: Position) => never,
): void {
  switch (t.kind) {
    case "nullable":
    case "tagged":
      return checkAliasCycle(root, t.inner, decls, path, fail);
    case "ref": {
      if (t.name === root) fail(`type alias "${root}" refers to itself (${[...path, root].join(" -> ")})`, t.at);
      const target = decls.get(t.name);
      if (target?.kind === "alias" && !path.includes(t.name)) {
        checkAliasCycle(root, target.type, decls, [...path, t.name], fail);
      }
      return;
    }
    default:
      return;
  }
}

/** Follow aliases (and tags, which do not change the value type) to the underlying type. */
export function underlying(t: TypeExpr, decls: DeclTable): TypeExpr | Decl {
  const seen = new Set<string>();
  let cur: TypeExpr = t;
  for (;;) {
    if (cur.kind === "tagged") {
      cur = cur.inner;
      continue;
    }
    if (cur.kind !== "ref") return cur;
    const d = decls.get(cur.name);
    if (!d || seen.has(cur.name)) return cur;
    if (d.kind !== "alias") return d;
    seen.add(cur.name);
    cur = d.type;
  }
}

function checkDefault(f: FieldDecl, decls: DeclTable, fail: (message: string, at: Position) => never): void {
  const lit = f.default;
  if (lit === undefined) return;
  if (f.optional) fail(`optional field "${f.name}" cannot have a default`, lit.at);

  const target = underlying(f.type, decls);
  const mismatch = (expected: string): never =>
    fail(`default for "${f.name}" must be ${expected}, found ${describeLiteral(lit)}`, lit.at);

  if (target.kind === "enum") {
    if (lit.kind !== "name") return mismatch(`a member of ${target.name}`);
    if (!target.members.some((m) => m.name === lit.value)) {
      fail(`"${lit.value}" is not a member of ${target.name}`, lit.at);
    }
    return;
  }
  if (target.kind !== "primitive") {
    fail(`field "${f.name}": defaults are only supported for scalar and enum types`, lit.at);
    return;
  }

  const prim = target.name;
  const range = INT_RANGES[prim];
  if (range) {
    if (lit.kind !== "number") return mismatch("an integer");
    const n = integerLiteral(lit.raw);
    if (n === undefined) return mismatch("an integer");
    if (n < range[0] || n > range[1]) fail(`default ${lit.raw} does not fit into ${prim}`, lit.at);
    return;
  }
  switch (prim) {
    case "f16":
    case "f32":
    case "f64":
      if (lit.kind !== "number") mismatch("a number");
      return;
    case "text":
      if (lit.kind !== "string") mismatch("a string");
      return;
    case "bool":
      if (lit.kind !== "bool") mismatch("true or false");
      return;
    default:
      fail(`field "${f.name}": defaults are not supported for ${prim}`, lit.at);
  }
}

function describeLiteral(lit: Literal): string {
  switch (lit.kind) {
    case "number":
      return lit.raw;
    case "string":
      return JSON.stringify(lit.value);
    case "bool":
      return String(lit.value);
    case "name":
      return lit.value;
  }
}
