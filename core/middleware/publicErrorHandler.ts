import { ErrorRequestHandler } from "express";
import { LibraryErrorKind, errorMessage, isLibraryError } from "../errors/libraryError.js";
import { VaultLogger } from "../logging/createLogger.js";

export class PublicError extends Error {
  statusCode: number;
  code?: string;

  constructor(
    message: string,
    statusCode: number = 400,
    code: string = "BAD_REQUEST"
  ) {
    super(message);
    this.name = "PublicError";
    this.statusCode = statusCode;
    this.code = code;
  }
}

const STATUS_BY_KIND: Record<LibraryErrorKind, number> = {
  unauthenticated: 401,
  forbidden: 403,
  not_found: 404,
  invalid_argument: 400,
  already_exists: 409,
  io_failure: 500,
  persistence_failure: 500,
};

/** Library errors become public ones; anything else stays private. */
export function toPublicError(err: unknown): PublicError | null {
  if (err instanceof PublicError) return err;
  if (!isLibraryError(err)) return null;

  const status = STATUS_BY_KIND[err.kind];
  // server-side failures keep their details out of the response
  const message = status >= 500 ? "storage operation failed" : err.message;
  return new PublicError(message, status, err.kind.toUpperCase());
}

export function createPublicErrorHandler(options: {
  logger?: VaultLogger;
  isProd: boolean;
}): ErrorRequestHandler {
  const { logger, isProd } = options;

  return (err: unknown, req, res, _next) => {
    const publicError = toPublicError(err);
    const status = publicError?.statusCode ?? 500;

    logger?.({
      level: status >= 500 ? "error" : "warn",
      msg: "HTTP handler error",
      method: req.method,
      path: req.originalUrl,
      status,
      code: publicError?.code,
      error: errorMessage(err),
    });

    res.status(status).json({
      error: publicError
        ? publicError.message
        : isProd
          ? "internal server error"
          : errorMessage(err),
      ...(publicError?.code ? { code: publicError.code } : {}),
    });
  };
}
