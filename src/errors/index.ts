export type TypolensErrorCode =
  | "FILE_READ"
  | "CONFIG_PARSE"
  | "CONFIG_WRITE"
  | "INVALID_PATTERN"
  | "DICTIONARY_LOAD"
  | "GRAMMAR_LOAD"
  | "GRAMMAR_PARSE"
  | "UNKNOWN";

export interface TypolensErrorOptions {
  code: TypolensErrorCode;
  message: string;
  path?: string;
  cause?: unknown;
}

export class TypolensError extends Error {
  public readonly code: TypolensErrorCode;
  public readonly path?: string;

  constructor(options: TypolensErrorOptions) {
    super(options.message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "TypolensError";
    this.code = options.code;
    this.path = options.path;
  }
}

export function isTypolensError(value: unknown): value is TypolensError {
  return value instanceof TypolensError;
}

export function asTypolensError(
  value: unknown,
  fallback: Omit<TypolensErrorOptions, "message"> & { message?: string } = { code: "UNKNOWN" },
): TypolensError {
  if (value instanceof TypolensError) return value;
  const detail = value instanceof Error ? value.message : String(value ?? "");
  const message = fallback.message ? (detail ? `${fallback.message}: ${detail}` : fallback.message) : detail || "Unknown typolens error";
  return new TypolensError({
    code: fallback.code,
    message,
    path: fallback.path,
    cause: value,
  });
}

/** Short text for log lines; never throws. */
export function describeError(value: unknown): string {
  if (value instanceof Error) return value.message;
  return String(value);
}
