// Error kinds and error classes

export type DecodeErrorKind =
  | "underflow"
  | "type-mismatch"
  | "invalid-encoding"
  | "depth-exceeded"
  | "missing-field"
  | "unknown-variant"
  | "overflow"
  | "utf8"
  | "non-canonical"
  | "custom";

export type EncodeErrorKind = "write" | "invalid-value" | "custom";

export class DecodeError extends Error {
  readonly kind: DecodeErrorKind;
  /** Offset of the item that failed to decode, when known. */
  readonly position: number | undefined;

  constructor(kind: DecodeErrorKind, message: string, position?: number, options?: { cause?: unknown }) {
    super(position === undefined ? message : `${message} at offset ${position}`, options);
    this.name = "DecodeError";
    this.kind = kind;
    this.position = position;
  }

  static underflow(needed: number, position: number): DecodeError {
    return new DecodeError("underflow", `unexpected end of input, ${needed} more byte(s) needed`, position);
  }

  static typeMismatch(found: string, expected: string, position: number): DecodeError {
    return new DecodeError("type-mismatch", `expected ${expected}, found ${found}`, position);
  }

  static invalid(message: string, position: number): DecodeError {
    return new DecodeError("invalid-encoding", message, position);
  }

  static depth(limit: number, position: number): DecodeError {
    return new DecodeError("depth-exceeded", `nesting exceeds maximum depth ${limit}`, position);
  }

  static missingField(index: number, name: string): DecodeError {
    return new DecodeError("missing-field", `missing value for field ${name} (index ${index})`);
  }

  static unknownVariant(index: number | bigint, position?: number): DecodeError {
    return new DecodeError("unknown-variant", `unknown variant ${index}`, position);
  }

  static overflow(value: bigint, target: string, position: number): DecodeError {
    return new DecodeError("overflow", `${value} does not fit into ${target}`, position);
  }

  static custom(message: string, cause?: unknown): DecodeError {
    return new DecodeError("custom", message, undefined, { cause });
  }
}

export class EncodeError extends Error {
  readonly kind: EncodeErrorKind;

  constructor(kind: EncodeErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EncodeError";
    this.kind = kind;
  }

  static write(message: string, cause?: unknown): EncodeError {
    return new EncodeError("write", message, { cause });
  }

  static invalidValue(message: string): EncodeError {
    return new EncodeError("invalid-value", message);
  }

  static custom(message: string, cause?: unknown): EncodeError {
    return new EncodeError("custom", message, { cause });
  }
}

export function isDecodeError(err: unknown, kind?: DecodeErrorKind): err is DecodeError {
  return err instanceof DecodeError && (kind === undefined || err.kind === kind);
}
