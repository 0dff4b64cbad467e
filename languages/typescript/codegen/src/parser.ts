import {
  type Decl,
  type EnumMember,
  type FieldDecl,
  type Literal,
  type Schema,
  type StructEncoding,
  type TypeExpr,
  type VariantDecl,
  isPrimitive,
} from "./ast.js";
import { type Position, SchemaError } from "./errors.js";
import { type Punct, type Token, tokenize } from "./lexer.js";

const MAX_INDEX = 0xffffffff;

function describe(t: Token): string {
  return t.kind === "eof" ? "end of input" : `"${t.text}"`;
}

export function pascal(name: string): string {
  return name
    .split("_")
    .filter((s) => s.length > 0)
    .map((s) => s[0].toUpperCase() + s.slice(1))
    .join("");
}

class Parser {
  private readonly tokens: Token[];
  private readonly file: string | undefined;
  private i = 0;
  /** Inline struct payloads, hoisted to top-level declarations. */
  private readonly hoisted: Decl[] = [];

  constructor(tokens: Token[], file: string | undefined) {
    this.tokens = tokens;
    this.file = file;
  }

  private peek(offset = 0): Token {
    return this.tokens[Math.min(this.i + offset, this.tokens.length - 1)];
  }

  private next(): Token {
    const t = this.peek();
    if (t.kind !== "eof") this.i++;
    return t;
  }

  private error(message: string, at: Position): SchemaError {
    return new SchemaError(message, at, this.file);
  }

  private isPunct(p: Punct, offset = 0): boolean {
    const t = this.peek(offset);
    return t.kind === "punct" && t.text === p;
  }

  private eat(p: Punct): boolean {
    if (!this.isPunct(p)) return false;
    this.i++;
    return true;
  }

  private expect(p: Punct): void {
    const t = this.peek();
    if (!this.eat(p)) throw this.error(`expected "${p}", found ${describe(t)}`, t.at);
  }

  private isKeyword(word: string): boolean {
    const t = this.peek();
    return t.kind === "ident" && t.text === word;
  }

  private ident(what: string): { name: string; at: Position } {
    const t = this.next();
    if (t.kind !== "ident") throw this.error(`expected ${what}, found ${describe(t)}`, t.at);
    return { name: t.text, at: t.at };
  }

  private integer(what: string, min: number, max: number): number {
    const t = this.next();
    if (t.kind !== "number") throw this.error(`expected ${what}, found ${describe(t)}`, t.at);
    if (!Number.isInteger(t.value) || t.value < min || t.value > max) {
      throw this.error(`${what} must be an integer between ${min} and ${max}, found ${t.text}`, t.at);
    }
    return t.value;
  }

  schema(): Schema {
    const decls: Decl[] = [];
    while (this.peek().kind !== "eof") {
      const decl = this.decl();
      decls.push(...this.hoisted.splice(0), decl);
    }
    return { file: this.file, decls };
  }

  private decl(): Decl {
    const t = this.peek();
    if (t.kind === "ident") {
      switch (t.text) {
        case "type":
          return this.alias();
        case "enum":
          return this.enumeration();
        case "struct":
          return this.struct();
        case "union":
          return this.union();
      }
    }
    throw this.error(`expected a declaration (type, enum, struct or union), found ${describe(t)}`, t.at);
  }

  private alias(): Decl {
    this.next();
    const { name, at } = this.ident("type name");
    this.expect("=");
    return { kind: "alias", name, type: this.type(), at };
  }

  private enumeration(): Decl {
    this.next();
    const { name, at } = this.ident("enum name");
    this.expect("{");
    const members: EnumMember[] = [];
    while (!this.eat("}")) {
      const start = this.peek().at;
      const index = this.integer("enum index", 0, MAX_INDEX);
      members.push({ index, name: this.ident("member name").name, at: start });
      this.eat(",");
    }
    return { kind: "enum", name, members, at };
  }

  private struct(): Decl {
    this.next();
    const { name, at } = this.ident("struct name");
    let encoding: StructEncoding = "map";
    if (this.isKeyword("as")) {
      this.next();
      const enc = this.ident(`"array" or "map"`);
      if (enc.name !== "array" && enc.name !== "map") {
        throw this.error(`expected "array" or "map", found "${enc.name}"`, enc.at);
      }
      encoding = enc.name;
    }
    return { kind: "struct", name, encoding, fields: this.fields(), at };
  }

  private fields(): FieldDecl[] {
    this.expect("{");
    const fields: FieldDecl[] = [];
    while (!this.eat("}")) {
      const at = this.peek().at;
      const index = this.integer("field index", 0, MAX_INDEX);
      const { name } = this.ident("field name");
      const optional = this.eat("?");
      this.expect(":");
      const type = this.type();
      const field: FieldDecl = { index, name, type, optional, at };
      if (this.eat("=")) field.default = this.literal();
      fields.push(field);
      this.eat(",");
    }
    return fields;
  }

  private union(): Decl {
    this.next();
    const { name, at } = this.ident("union name");
    this.expect("{");
    const variants: VariantDecl[] = [];
    while (!this.eat("}")) {
      const start = this.peek().at;
      const index = this.integer("variant index", 0, MAX_INDEX);
      const variant: VariantDecl = { index, name: this.ident("variant name").name, at: start };
      if (this.eat(":")) {
        if (this.isPunct("{")) {
          const hoisted = `${name}${pascal(variant.name)}`;
          this.hoisted.push({ kind: "struct", name: hoisted, encoding: "map", fields: this.fields(), at: start });
          variant.payload = { kind: "ref", name: hoisted, at: start };
        } else {
          variant.payload = this.type();
        }
      }
      variants.push(variant);
      this.eat(",");
    }
    return { kind: "union", name, variants, at };
  }

  private type(): TypeExpr {
    const t = this.peek();
    if (this.eat("?")) return { kind: "nullable", inner: this.type(), at: t.at };
    if (this.eat("[")) {
      const item = this.type();
      let length: number | undefined;
      if (this.eat(";")) length = this.integer("array length", 1, MAX_INDEX);
      this.expect("]");
      return length === undefined ? { kind: "array", item, at: t.at } : { kind: "array", item, length, at: t.at };
    }
    if (t.kind !== "ident") throw this.error(`expected a type, found ${describe(t)}`, t.at);

    if (t.text === "map" && this.isPunct("<", 1)) {
      this.next();
      this.expect("<");
      const key = this.type();
      this.expect(",");
      const value = this.type();
      this.expect(">");
      return { kind: "map", key, value, at: t.at };
    }
    if (t.text === "set" && this.isPunct("<", 1)) {
      this.next();
      this.expect("<");
      const item = this.type();
      this.expect(">");
      return { kind: "set", item, at: t.at };
    }
    if (t.text === "tag" && this.isPunct("(", 1)) {
      this.next();
      this.expect("(");
      const tag = this.integer("tag number", 0, Number.MAX_SAFE_INTEGER);
      this.expect(")");
      return { kind: "tagged", tag, inner: this.type(), at: t.at };
    }

    this.next();
    const name = t.text;
    if (isPrimitive(name)) return { kind: "primitive", name, at: t.at };
    return { kind: "ref", name, at: t.at };
  }

  private literal(): Literal {
    const t = this.next();
    switch (t.kind) {
      case "number":
        return { kind: "number", value: t.value, raw: t.text, at: t.at };
      case "string":
        return { kind: "string", value: t.value, at: t.at };
      case "ident":
        if (t.text === "true" || t.text === "false") return { kind: "bool", value: t.text === "true", at: t.at };
        return { kind: "name", value: t.text, at: t.at };
      default:
        throw this.error(`expected a default value, found ${describe(t)}`, t.at);
    }
  }
}

/** Parse schema source into declarations. Inline variant payloads become structs named `<Union><Variant>`. */
export function parse(source: string, file?: string): Schema {
  return new Parser(tokenize(source, file), file).schema();
}
