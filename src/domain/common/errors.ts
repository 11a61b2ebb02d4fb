export type ErrorKind = "config" | "validation" | "io" | "decode" | "unknown";

export class AppError extends Error {
  readonly kind: ErrorKind;
  override readonly cause?: unknown;

  constructor(kind: ErrorKind, message: string, cause?: unknown) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
    this.cause = cause;
  }
}

export class ConfigError extends AppError {
  constructor(message: string, cause?: unknown) {
    super("config", message, cause);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, cause?: unknown) {
    super("validation", message, cause);
  }
}

export class InputError extends AppError {
  readonly path?: string;

  constructor(message: string, cause?: unknown, path?: string) {
    super("io", message, cause);
    this.path = path;
  }
}

/**
 * Input bytes that are not valid UTF-8.
 * `source` is the file name, or "<stdin>".
 */
export class DecodeError extends AppError {
  readonly source: string;

  constructor(source: string, cause?: unknown) {
    super("decode", `Cannot decode ${describeSource(source)}: input is not valid UTF-8`, cause);
    this.source = source;
  }
}

export const STDIN_SOURCE = "<stdin>";

function describeSource(source: string): string {
  return source === STDIN_SOURCE ? "standard input" : `file '${source}'`;
}

export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) return error;
  if (error instanceof Error)
    return new AppError("unknown", error.message, error);
  return new AppError("unknown", String(error));
}
