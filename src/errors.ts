export type LockFileErrorKind = "io" | "decode" | "encode";

const LOCK_FILE_MESSAGES: Record<LockFileErrorKind, string> = {
  io: "unable to read lock file",
  decode: "unable to deserialize lock file",
  encode: "unable to serialize lock file",
};

/**
 * Failure to read, parse, or write a lock file.
 * `kind` tells the caller which stage failed; `cause` holds the underlying error.
 */
export class LockFileError extends Error {
  readonly kind: LockFileErrorKind;

  constructor(kind: LockFileErrorKind, detail?: string, options?: { cause?: unknown }) {
    super(
      detail ? `${LOCK_FILE_MESSAGES[kind]}: ${detail}` : LOCK_FILE_MESSAGES[kind],
      options
    );
    this.name = "LockFileError";
    this.kind = kind;
  }
}

export type IntegrityErrorKind = "hash-copy" | "hash-parse";

/**
 * Failure while computing an integrity string.
 */
export class IntegrityError extends Error {
  readonly kind: IntegrityErrorKind;

  constructor(kind: IntegrityErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IntegrityError";
    this.kind = kind;
  }
}

/**
 * A dependency key that is not of the form `name@versionSpec`.
 */
export class DependencyIdError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DependencyIdError";
  }
}

/**
 * Extract a message from an unknown thrown value.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
