import type { SchemeErrorKind } from "imagescheme-shared";

/**
 * Terminal failure of a scheme generation run. The pipeline never returns a
 * partial scheme; callers decide whether to retry with different input.
 */
export class SchemeError extends Error {
  readonly kind: SchemeErrorKind;

  constructor(kind: SchemeErrorKind, message: string) {
    super(message);
    this.name = "SchemeError";
    this.kind = kind;
  }
}

export class ImageDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ImageDecodeError";
  }
}

export function toSchemeError(error: unknown, kind: SchemeErrorKind = "Other"): SchemeError {
  if (error instanceof SchemeError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new SchemeError(kind, message);
}
