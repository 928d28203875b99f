import fsp from "node:fs/promises";
import Database from "better-sqlite3";
import type { AppConfig } from "../config";
import { ConfigError, InvalidBackupError } from "../errors";

/** How long a connection waits on a locked database before SQLITE_BUSY. */
export const BUSY_TIMEOUT_MS = 5000;

export const SQLITE_HEADER = Buffer.from("SQLite format 3\0", "latin1");

export type OpenOptions = {
  readonly?: boolean;
  fileMustExist?: boolean;
};

/** The part of a connection a snapshot writes through. */
export interface SnapshotSource {
  prepare(sql: string): { run(...params: unknown[]): unknown; get(...params: unknown[]): unknown };
  exec(sql: string): unknown;
  backup(destination: string): Promise<unknown>;
}

/**
 * Access to SQLite files on disk. The plain and SQLCipher variants differ in
 * how a connection is keyed, how a consistent copy is written and what a
 * valid file header looks like; everything above this interface is shared.
 */
export interface StorageBackend {
  readonly kind: "plain" | "encrypted";
  open(file: string, opts?: OpenOptions): Database.Database;
  /** Writes a consistent copy of `source` into the (empty) file at `destination`. */
  snapshot(source: SnapshotSource, destination: string): Promise<void>;
  /** Cheap format check before any SQLite connection is opened on the file. */
  validateHeader(file: string): Promise<void>;
}

export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export async function hasSqliteHeader(file: string): Promise<boolean> {
  const handle = await fsp.open(file, "r");
  try {
    const buf = Buffer.alloc(SQLITE_HEADER.length);
    const { bytesRead } = await handle.read(buf, 0, buf.length, 0);
    return bytesRead === buf.length && buf.equals(SQLITE_HEADER);
  } finally {
    await handle.close();
  }
}

function connect(file: string, opts: OpenOptions): Database.Database {
  return new Database(file, {
    readonly: opts.readonly ?? false,
    fileMustExist: opts.fileMustExist ?? false,
    timeout: BUSY_TIMEOUT_MS,
  });
}

export class PlainBackend implements StorageBackend {
  readonly kind = "plain";

  open(file: string, opts: OpenOptions = {}): Database.Database {
    return connect(file, opts);
  }

  // Online backup API: copies committed pages, WAL frames included, and
  // restarts on its own if a writer changes the source mid-copy.
  async snapshot(source: SnapshotSource, destination: string): Promise<void> {
    await source.backup(destination);
  }

  async validateHeader(file: string): Promise<void> {
    if (!(await hasSqliteHeader(file))) {
      throw new InvalidBackupError(`${file} is not a SQLite database`);
    }
  }
}

export class EncryptedBackend implements StorageBackend {
  readonly kind = "encrypted";

  constructor(private readonly key: string) {}

  open(file: string, opts: OpenOptions = {}): Database.Database {
    const db = connect(file, opts);
    try {
      db.exec(`PRAGMA key = ${quoteLiteral(this.key)}`);
      // Stock SQLite ignores unknown pragmas, so a silent `key` proves nothing.
      const versionStmt = db.prepare("PRAGMA cipher_version");
      const version = versionStmt.reader ? versionStmt.pluck().get() : undefined;
      if (typeof version !== "string" || version === "") {
        throw new ConfigError(
          "TRADEX_USE_SQLCIPHER=1 but the SQLite library loaded by better-sqlite3 was not built with SQLCipher",
        );
      }
    } catch (err) {
      db.close();
      throw err;
    }
    return db;
  }

  async snapshot(source: SnapshotSource, destination: string): Promise<void> {
    source.prepare("ATTACH DATABASE ? AS snapshot KEY ?").run(destination, this.key);
    try {
      source.prepare("SELECT sqlcipher_export('snapshot')").get();
    } finally {
      source.exec("DETACH DATABASE snapshot");
    }
  }

  async validateHeader(file: string): Promise<void> {
    if (await hasSqliteHeader(file)) {
      throw new InvalidBackupError(`${file} is an unencrypted SQLite database, expected a SQLCipher file`);
    }
  }
}

export function createStorageBackend(config: Pick<AppConfig, "encryption">): StorageBackend {
  return config.encryption.enabled ? new EncryptedBackend(config.encryption.key) : new PlainBackend();
}
