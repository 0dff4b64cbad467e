import { check } from "./check.js";
import { type EmitOptions, emit } from "./emit.js";
import { parse } from "./parser.js";

export interface CompileOptions extends EmitOptions {
  /** Name used in diagnostics and the generated header. */
  file?: string;
}

/** Compile `.pcb` schema source to a TypeScript module. Throws `SchemaError` on invalid input. */
export function compile(source: string, options: CompileOptions = {}): string {
  const schema = parse(source, options.file);
  const decls = check(schema);
  return emit(schema, decls, options);
}

export { parse, pascal } from "./parser.js";
export { check, underlying } from "./check.js";
export type { DeclTable } from "./check.js";
export { emit, DEFAULT_RUNTIME_IMPORT } from "./emit.js";
export type { EmitOptions } from "./emit.js";
export { tokenize } from "./lexer.js";
export type { Token } from "./lexer.js";
export { SchemaError } from "./errors.js";
export type { Position } from "./errors.js";
export { PRIMITIVES, isPrimitive } from "./ast.js";
export type {
  Decl,
  EnumMember,
  FieldDecl,
  Literal,
  Primitive,
  Schema,
  StructEncoding,
  TypeExpr,
  VariantDecl,
} from "./ast.js";
