export type LibraryErrorKind =
  | "unauthenticated"
  | "forbidden"
  | "not_found"
  | "invalid_argument"
  | "already_exists"
  | "io_failure"
  | "persistence_failure";

export class LibraryError extends Error {
  readonly kind: LibraryErrorKind;

  constructor(kind: LibraryErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LibraryError";
    this.kind = kind;
  }
}

export function isLibraryError(err: unknown, kind?: LibraryErrorKind): err is LibraryError {
  return err instanceof LibraryError && (kind === undefined || err.kind === kind);
}

/** Node fs errors carry a string `code`; anything else reads as undefined. */
export function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    const { code } = err;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
