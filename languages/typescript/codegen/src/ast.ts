import type { Position } from "./errors.js";

export const PRIMITIVES = [
  "bool",
  "u8",
  "u16",
  "u32",
  "u64",
  "i8",
  "i16",
  "i32",
  "i64",
  "int",
  "f16",
  "f32",
  "f64",
  "text",
  "bytes",
  "timestamp",
] as const;

export type Primitive = (typeof PRIMITIVES)[number];

export function isPrimitive(name: string): name is Primitive {
  return PRIMITIVES.some((p) => p === name);
}

export type TypeExpr =
  | { kind: "primitive"; name: Primitive; at: Position }
  | { kind: "array"; item: TypeExpr; length?: number; at: Position }
  | { kind: "map"; key: TypeExpr; value: TypeExpr; at: Position }
  | { kind: "set"; item: TypeExpr; at: Position }
  | { kind: "nullable"; inner: TypeExpr; at: Position }
  | { kind: "tagged"; tag: number; inner: TypeExpr; at: Position }
  | { kind: "ref"; name: string; at: Position };

export type Literal =
  | { kind: "number"; value: number; raw: string; at: Position }
  | { kind: "string"; value: string; at: Position }
  | { kind: "bool"; value: boolean; at: Position }
  | { kind: "name"; value: string; at: Position };

export interface FieldDecl {
  index: number;
  name: string;
  type: TypeExpr;
  optional: boolean;
  default?: Literal;
  at: Position;
}

export interface EnumMember {
  index: number;
  name: string;
  at: Position;
}

export interface VariantDecl {
  index: number;
  name: string;
  /** Absent for unit variants. */
  payload?: TypeExpr;
  at: Position;
}

export type StructEncoding = "map" | "array";

export type Decl =
  | { kind: "alias"; name: string; type: TypeExpr; at: Position }
  | { kind: "enum"; name: string; members: EnumMember[]; at: Position }
  | { kind: "struct"; name: string; encoding: StructEncoding; fields: FieldDecl[]; at: Position }
  | { kind: "union"; name: string; variants: VariantDecl[]; at: Position };

export interface Schema {
  file?: string;
  decls: Decl[];
}
