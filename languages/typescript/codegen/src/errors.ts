export interface Position {
  line: number;
  column: number;
}

/** A problem in a schema, located at a 1-based line and column. */
export class SchemaError extends Error {
  readonly line: number;
  readonly column: number;

  constructor(message: string, at: Position, file?: string) {
    super(`${file ?? "<schema>"}:${at.line}:${at.column}: ${message}`);
    this.name = "SchemaError";
    this.line = at.line;
    this.column = at.column;
  }
}
