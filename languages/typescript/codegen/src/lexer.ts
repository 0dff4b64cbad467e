import { type Position, SchemaError } from "./errors.js";

const PUNCT = ["{", "}", "[", "]", "<", ">", "(", ")", ":", ";", ",", "=", "?"] as const;

export type Punct = (typeof PUNCT)[number];

export type Token =
  | { kind: "ident"; text: string; at: Position }
  | { kind: "number"; text: string; value: number; at: Position }
  | { kind: "string"; text: string; value: string; at: Position }
  | { kind: "punct"; text: Punct; at: Position }
  | { kind: "eof"; text: ""; at: Position };

function asPunct(c: string): Punct | undefined {
  return PUNCT.find((p) => p === c);
}

const IDENT_START = /[A-Za-z_]/;
const IDENT_PART = /[A-Za-z0-9_]/;
const NUMBER = /^-?(?:0x[0-9a-fA-F]+|\d+(?:\.\d+)?(?:[eE][+-]?\d+)?)/;

export function tokenize(source: string, file?: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  let line = 1;
  let lineStart = 0;

  const here = (): Position => ({ line, column: i - lineStart + 1 });

  while (i < source.length) {
    const c = source[i];

    if (c === "\n") {
      i++;
      line++;
      lineStart = i;
      continue;
    }
    if (c === " " || c === "\t" || c === "\r") {
      i++;
      continue;
    }
    if (c === "/" && source[i + 1] === "/") {
      while (i < source.length && source[i] !== "\n") i++;
      continue;
    }

    const at = here();

    if (IDENT_START.test(c)) {
      const start = i;
      while (i < source.length && IDENT_PART.test(source[i])) i++;
      tokens.push({ kind: "ident", text: source.slice(start, i), at });
      continue;
    }

    if (/\d/.test(c) || (c === "-" && /\d/.test(source[i + 1] ?? ""))) {
      const m = NUMBER.exec(source.slice(i));
      if (!m) throw new SchemaError(`invalid number`, at, file);
      const text = m[0];
      i += text.length;
      const value = text.startsWith("-0x") ? -Number(text.slice(1)) : Number(text);
      tokens.push({ kind: "number", text, value, at });
      continue;
    }

    if (c === '"') {
      const start = i;
      i++;
      while (i < source.length && source[i] !== '"') {
        if (source[i] === "\n") throw new SchemaError("unterminated string", at, file);
        i += source[i] === "\\" ? 2 : 1;
      }
      if (i >= source.length) throw new SchemaError("unterminated string", at, file);
      i++;
      const text = source.slice(start, i);
      tokens.push({ kind: "string", text, value: unquote(text, at, file), at });
      continue;
    }

    const p = asPunct(c);
    if (p) {
      i++;
      tokens.push({ kind: "punct", text: p, at });
      continue;
    }

    throw new SchemaError(`unexpected character ${JSON.stringify(c)}`, at, file);
  }

  tokens.push({ kind: "eof", text: "", at: here() });
  return tokens;
}

function unquote(text: string, at: Position, file?: string): string {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    throw new SchemaError(`invalid string literal ${text}: ${err instanceof Error ? err.message : err}`, at, file);
  }
  if (typeof value !== "string") throw new SchemaError(`invalid string literal ${text}`, at, file);
  return value;
}
