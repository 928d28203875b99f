import Database from "better-sqlite3";

export type TradexDbErrorCode =
  | "SOURCE_NOT_FOUND"
  | "INVALID_BACKUP"
  | "PERMISSION_DENIED"
  | "IO_ERROR"
  | "CONFIG_ERROR";

export abstract class TradexDbError extends Error {
  abstract readonly code: TradexDbErrorCode;
  readonly exitCode = 1;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The database (or backup file) to read from does not exist. */
export class SourceNotFoundError extends TradexDbError {
  readonly code = "SOURCE_NOT_FOUND";
}

/** The file handed to restore is not a usable database. */
export class InvalidBackupError extends TradexDbError {
  readonly code = "INVALID_BACKUP";
}

export class PermissionError extends TradexDbError {
  readonly code = "PERMISSION_DENIED";
}

export class IOError extends TradexDbError {
  readonly code = "IO_ERROR";
}

export class ConfigError extends TradexDbError {
  readonly code = "CONFIG_ERROR";
}

type TradexDbErrorClass = new (message: string, options?: { cause?: unknown }) => TradexDbError;

const PERMISSION_ERRNOS = new Set(["EACCES", "EPERM", "EROFS"]);
const PERMISSION_SQLITE_CODES = new Set(["SQLITE_READONLY", "SQLITE_PERM", "SQLITE_AUTH"]);

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err && typeof err.code === "string";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Normalizes anything thrown by fs or better-sqlite3 into the error taxonomy.
 * Errors that already belong to it pass through untouched.
 */
export function toTradexDbError(err: unknown, context: string, Fallback: TradexDbErrorClass = IOError): TradexDbError {
  if (err instanceof TradexDbError) return err;
  const detail = errorMessage(err);
  if (err instanceof Database.SqliteError) {
    if (PERMISSION_SQLITE_CODES.has(err.code)) {
      return new PermissionError(`${context}: ${detail}`, { cause: err });
    }
    return new Fallback(`${context}: ${detail}`, { cause: err });
  }
  if (isErrnoException(err) && PERMISSION_ERRNOS.has(err.code ?? "")) {
    return new PermissionError(`${context}: ${detail}`, { cause: err });
  }
  return new Fallback(`${context}: ${detail}`, { cause: err });
}
