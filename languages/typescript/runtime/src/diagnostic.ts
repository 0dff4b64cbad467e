import { Decoder, type DecoderOptions } from "./decoder.js";
import { DecodeError } from "./errors.js";
import { Type } from "./grammar.js";

export interface DiagnosticOptions extends DecoderOptions {
  /** Spaces per nesting level; 0 (default) renders each item on one line. */
  indent?: number;
}

function hex(b: Uint8Array): string {
  let s = "h'";
  for (const x of b) s += x.toString(16).padStart(2, "0");
  return s + "'";
}

export function formatFloat(v: number): string {
  if (Number.isNaN(v)) return "NaN";
  if (v === Infinity) return "Infinity";
  if (v === -Infinity) return "-Infinity";
  if (Object.is(v, -0)) return "-0.0";
  if (Number.isInteger(v) && Math.abs(v) < 1e21) return `${v}.0`;
  return String(v);
}

function layout(open: string, close: string, items: string[], level: number, indent: number): string {
  if (items.length === 0) return open + close;
  if (indent === 0) return open + items.join(", ") + close;
  const inner = " ".repeat((level + 1) * indent);
  const outer = " ".repeat(level * indent);
  return `${open.trimEnd()}\n${items.map((x) => inner + x).join(",\n")}\n${outer}${close}`;
}

function collect(d: Decoder, len: number | null, read: () => string): string[] {
  const items: string[] = [];
  if (len === null) {
    while (!d.isBreak()) items.push(read());
    d.readBreak();
  } else {
    for (let i = 0; i < len; i++) items.push(read());
  }
  return items;
}

function render(d: Decoder, level: number, indent: number): string {
  const t = d.datatype();
  switch (t) {
    case Type.Bool:
      return String(d.bool());
    case Type.Null:
      d.null();
      return "null";
    case Type.Undefined:
      d.undefined();
      return "undefined";
    case Type.U8:
    case Type.U16:
    case Type.U32:
    case Type.U64:
      return d.unsigned().toString();
    case Type.I8:
    case Type.I16:
    case Type.I32:
    case Type.I64:
      return d.negative().toString();
    case Type.F16:
    case Type.F32:
    case Type.F64:
      return formatFloat(d.float());
    case Type.Simple:
      return `simple(${d.simple()})`;
    case Type.Bytes:
      return hex(d.bytes());
    case Type.BytesIndef:
      return `(_ ${d.bytesChunks().map(hex).join(", ")})`;
    case Type.String:
      return JSON.stringify(d.text());
    case Type.StringIndef:
      return `(_ ${d.textChunks().map((s) => JSON.stringify(s)).join(", ")})`;
    case Type.Array:
    case Type.ArrayIndef:
      return d.nested(() => {
        const len = d.array();
        const items = collect(d, len, () => render(d, level + 1, indent));
        return layout(len === null ? "[_ " : "[", "]", items, level, indent);
      });
    case Type.Map:
    case Type.MapIndef:
      return d.nested(() => {
        const len = d.map();
        const items = collect(d, len, () => {
          const k = render(d, level + 1, indent);
          return `${k}: ${render(d, level + 1, indent)}`;
        });
        return layout(len === null ? "{_ " : "{", "}", items, level, indent);
      });
    case Type.Tag: {
      const tag = d.tag();
      return `${tag}(${d.nested(() => render(d, level, indent))})`;
    }
    case Type.Break:
      throw DecodeError.invalid("unexpected break", d.position);
    case Type.Unknown:
      throw DecodeError.invalid("reserved initial byte", d.position);
  }
}

/**
 * Render every top-level item of `bytes` in CBOR diagnostic notation
 * (RFC 8949, section 8), one item per line.
 */
export function diagnostic(bytes: Uint8Array, options: DiagnosticOptions = {}): string {
  const d = new Decoder(bytes, options);
  const indent = options.indent ?? 0;
  const out: string[] = [];
  while (!d.isEnd) out.push(render(d, 0, indent));
  return out.join("\n");
}
