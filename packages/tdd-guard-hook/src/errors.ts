export const TDD_GUARD_ERROR_KINDS = Object.freeze({
  STORAGE_READ_FAILURE: "STORAGE_READ_FAILURE",
  STORAGE_WRITE_FAILURE: "STORAGE_WRITE_FAILURE",
  LOCK_TIMEOUT: "LOCK_TIMEOUT",
} as const);

export type TddGuardErrorKind = (typeof TDD_GUARD_ERROR_KINDS)[keyof typeof TDD_GUARD_ERROR_KINDS];

export class TddGuardError extends Error {
  readonly kind: TddGuardErrorKind;

  constructor(kind: TddGuardErrorKind, message: string, options?: { cause?: unknown }) {
    super(`${kind} ${message}`, options);
    this.name = "TddGuardError";
    this.kind = kind;
  }
}

export function asMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
