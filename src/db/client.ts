import fs from "node:fs";
import path from "node:path";
import type Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import type { AppConfig } from "../config";
import { toTradexDbError } from "../errors";
import { ensureOwnerOnly, touchOwnerOnly } from "../utils/file-mode";
import { createStorageBackend, type StorageBackend } from "./backends";

export type AppDatabase = BetterSQLite3Database;

export type DbClient = {
  path: string;
  sqlite: Database.Database;
  db: AppDatabase;
  close: () => void;
};

/**
 * Opens the live database in WAL mode with foreign keys enforced. The file is
 * created 600 before SQLite sees it so the WAL and shm files inherit the mode.
 */
export function openDbClient(
  config: Pick<AppConfig, "dbPath" | "encryption">,
  backend: StorageBackend = createStorageBackend(config),
): DbClient {
  const dbPath = config.dbPath;
  let sqlite: Database.Database | undefined;
  try {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true, mode: 0o700 });
    touchOwnerOnly(dbPath);
    const conn = backend.open(dbPath);
    sqlite = conn;
    // first statements to read the file: a foreign file or a wrong key fails here
    conn.pragma("journal_mode = WAL");
    conn.pragma("foreign_keys = ON");
    ensureOwnerOnly(dbPath);

    return {
      path: dbPath,
      sqlite: conn,
      db: drizzle(conn),
      close: () => {
        conn.close();
        ensureOwnerOnly(dbPath);
      },
    };
  } catch (err) {
    sqlite?.close();
    throw toTradexDbError(err, `cannot open database ${dbPath}`);
  }
}
