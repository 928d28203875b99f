import { chmodSync, existsSync, mkdirSync, readdirSync, readFileSync, statSync, writeFileSync } from "node:fs";
import fsp from "node:fs/promises";
import { dirname, join } from "node:path";
import Database from "better-sqlite3";
import { afterEach, describe, expect, it, vi } from "vitest";
import { loadConfig, type AppConfig } from "../src/config";
import { PlainBackend, SQLITE_HEADER } from "../src/db/backends";
import { openDbClient } from "../src/db/client";
import { initializeDatabase } from "../src/db/init";
import { IOError, InvalidBackupError, PermissionError, SourceNotFoundError } from "../src/errors";
import { createUsersRepo } from "../src/repositories/users";
import { BackupRestoreTool } from "../src/services/backup-restore";
import { fileMode } from "../src/utils/file-mode";
import { isRoot, useTempDirs } from "./helpers";

const tempDir = useTempDirs("tradex-backup");

function setup() {
  const dir = tempDir();
  const config = loadConfig({ TRADEX_DB_PATH: join(dir, "live", "users.db"), TRADEX_ENV: "production" });
  const tool = new BackupRestoreTool(config, new PlainBackend());
  return { dir, config, tool };
}

async function openLive(config: AppConfig) {
  const client = openDbClient(config);
  await initializeDatabase(client, config);
  return { client, users: createUsersRepo(client.db) };
}

function usernamesIn(file: string): string[] {
  const db = new Database(file, { fileMustExist: true });
  try {
    return db
      .prepare("SELECT username FROM users ORDER BY username")
      .pluck()
      .all()
      .map(String);
  } finally {
    db.close();
  }
}

afterEach(() => {
  vi.restoreAllMocks();
});

// Makes opening the tool's temporary files fail the way a read-only directory does.
function denyTempFiles(tag: "backup" | "restore") {
  const realOpen = fsp.open.bind(fsp);
  vi.spyOn(fsp, "open").mockImplementation(async (file, flags, mode) => {
    if (String(file).includes(`.${tag}-`)) {
      throw Object.assign(new Error(`EACCES: permission denied, open '${String(file)}'`), { code: "EACCES" });
    }
    return realOpen(file, flags, mode);
  });
}

function strayFiles(dir: string): string[] {
  return readdirSync(dir).filter((f) => f.startsWith("."));
}

describe("backup", () => {
  it("fails with SourceNotFoundError when the database does not exist", async () => {
    const { dir, tool } = setup();
    const dest = join(dir, "backup.db");
    await expect(tool.backup(dest)).rejects.toBeInstanceOf(SourceNotFoundError);
    expect(existsSync(dest)).toBe(false);
  });

  it("captures commits that still live only in the WAL of an open connection", async () => {
    const { dir, config, tool } = setup();
    const { client, users } = await openLive(config);
    try {
      await users.create({ username: "alice", password: "alice-pass-1" });
      expect(statSync(`${config.dbPath}-wal`).size).toBeGreaterThan(0);

      const dest = join(dir, "backups", "snapshot.db");
      const result = await tool.backup(dest);

      expect(result.destination).toBe(dest);
      expect(result.bytes).toBe(statSync(dest).size);
      expect(usernamesIn(dest)).toEqual(["alice"]);
      // still usable by the live connection afterwards
      expect(await users.get("alice")).not.toBeNull();
    } finally {
      client.close();
    }
  });

  it("writes a self-contained file: rollback journal header, no sidecars, no temp files", async () => {
    const { dir, config, tool } = setup();
    const { client } = await openLive(config);
    client.close();

    const dest = join(dir, "snapshot.db");
    await tool.backup(dest);

    const header = readFileSync(dest).subarray(0, 20);
    expect(header.subarray(0, 16).equals(SQLITE_HEADER)).toBe(true);
    expect(header[18]).toBe(1);
    expect(header[19]).toBe(1);
    expect(existsSync(`${dest}-wal`)).toBe(false);
    expect(existsSync(`${dest}-journal`)).toBe(false);
    expect(strayFiles(dir)).toEqual([]);
  });

  it("leaves the backup and the source at 600 whatever the umask", async () => {
    const { dir, config, tool } = setup();
    const { client } = await openLive(config);
    client.close();

    const previous = process.umask(0o000);
    try {
      const dest = join(dir, "open-umask.db");
      await tool.backup(dest);
      expect(fileMode(dest)).toBe(0o600);
      expect(fileMode(config.dbPath)).toBe(0o600);
    } finally {
      process.umask(previous);
    }
  });

  it("overwrites an existing backup with a fresh snapshot", async () => {
    const { dir, config, tool } = setup();
    const { client, users } = await openLive(config);
    try {
      const dest = join(dir, "snapshot.db");
      await users.create({ username: "alice", password: "alice-pass-1" });
      await tool.backup(dest);
      await users.create({ username: "bob", password: "bob-pass-12" });
      await tool.backup(dest);
      expect(usernamesIn(dest)).toEqual(["alice", "bob"]);
      expect(fileMode(dest)).toBe(0o600);
    } finally {
      client.close();
    }
  });

  it("refuses to write the backup over the live database", async () => {
    const { config, tool } = setup();
    const { client } = await openLive(config);
    client.close();
    await expect(tool.backup(config.dbPath)).rejects.toBeInstanceOf(IOError);
  });

  it("fails with PermissionError when the destination directory refuses new files", async () => {
    const { dir, config, tool } = setup();
    const { client } = await openLive(config);
    client.close();

    const destDir = join(dir, "backups");
    denyTempFiles("backup");
    await expect(tool.backup(join(destDir, "backup.db"))).rejects.toBeInstanceOf(PermissionError);
    expect(readdirSync(destDir)).toEqual([]);
  });

  it.skipIf(isRoot)("fails with PermissionError under a read-only directory and leaves nothing behind", async () => {
    const { dir, config, tool } = setup();
    const { client } = await openLive(config);
    client.close();

    const locked = join(dir, "locked");
    mkdirSync(locked);
    chmodSync(locked, 0o500);
    try {
      await expect(tool.backup(join(locked, "backup.db"))).rejects.toBeInstanceOf(PermissionError);
      expect(readdirSync(locked)).toEqual([]);
    } finally {
      chmodSync(locked, 0o700);
    }
  });
});

describe("restore", () => {
  it("brings back the state captured by backup", async () => {
    const { dir, config, tool } = setup();
    const dest = join(dir, "snapshot.db");

    const live = await openLive(config);
    await live.users.create({ username: "alice", password: "alice-pass-1" });
    await tool.backup(dest);
    await live.users.create({ username: "bob", password: "bob-pass-12" });
    live.client.close();

    const result = await tool.restore(dest);
    expect(result.target).toBe(config.dbPath);
    expect(fileMode(config.dbPath)).toBe(0o600);
    expect(existsSync(`${config.dbPath}-wal`)).toBe(false);
    expect(strayFiles(dirname(config.dbPath))).toEqual([]);
    // WAL file format version in the header: back to write-ahead logging
    expect(readFileSync(config.dbPath)[18]).toBe(2);

    const reopened = await openLive(config);
    try {
      expect(reopened.client.sqlite.pragma("journal_mode", { simple: true })).toBe("wal");
      expect((await reopened.users.list()).map((u) => u.username)).toEqual(["alice"]);
    } finally {
      reopened.client.close();
    }
  });

  it("gives the same result when repeated", async () => {
    const { dir, config, tool } = setup();
    const dest = join(dir, "snapshot.db");
    const live = await openLive(config);
    await live.users.create({ username: "alice", password: "alice-pass-1" });
    live.client.close();
    await tool.backup(dest);

    await tool.restore(dest);
    const first = usernamesIn(config.dbPath);
    await tool.restore(dest);
    expect(usernamesIn(config.dbPath)).toEqual(first);
    expect(first).toEqual(["alice"]);
  });

  it("restores into an explicit target path that does not exist yet", async () => {
    const { dir, config, tool } = setup();
    const dest = join(dir, "snapshot.db");
    const live = await openLive(config);
    await live.users.create({ username: "alice", password: "alice-pass-1" });
    live.client.close();
    await tool.backup(dest);

    const target = join(dir, "elsewhere", "copy.db");
    await tool.restore(dest, target);
    expect(usernamesIn(target)).toEqual(["alice"]);
    expect(fileMode(target)).toBe(0o600);
  });

  it("rejects a file that is not a database and leaves the live file untouched", async () => {
    const { dir, config, tool } = setup();
    const live = await openLive(config);
    await live.users.create({ username: "alice", password: "alice-pass-1" });
    live.client.close();
    const before = readFileSync(config.dbPath);

    const bogus = join(dir, "notes.txt");
    writeFileSync(bogus, "definitely not a database\n");

    await expect(tool.restore(bogus)).rejects.toBeInstanceOf(InvalidBackupError);
    expect(readFileSync(config.dbPath).equals(before)).toBe(true);
    expect(strayFiles(dirname(config.dbPath))).toEqual([]);
  });

  it("rejects a file with a SQLite header but a corrupt body", async () => {
    const { dir, config, tool } = setup();
    const live = await openLive(config);
    live.client.close();
    const before = readFileSync(config.dbPath);

    const corrupt = join(dir, "corrupt.db");
    writeFileSync(corrupt, Buffer.concat([SQLITE_HEADER, Buffer.alloc(4080, 0xab)]));

    await expect(tool.restore(corrupt)).rejects.toBeInstanceOf(InvalidBackupError);
    expect(readFileSync(config.dbPath).equals(before)).toBe(true);
    expect(strayFiles(dirname(config.dbPath))).toEqual([]);
  });

  it("fails with PermissionError when the target directory refuses new files", async () => {
    const { dir, config, tool } = setup();
    const dest = join(dir, "snapshot.db");
    const live = await openLive(config);
    await live.users.create({ username: "alice", password: "alice-pass-1" });
    live.client.close();
    await tool.backup(dest);
    const before = readFileSync(config.dbPath);

    denyTempFiles("restore");
    await expect(tool.restore(dest)).rejects.toBeInstanceOf(PermissionError);
    expect(readdirSync(dirname(config.dbPath))).toEqual(["users.db"]);
    expect(readFileSync(config.dbPath).equals(before)).toBe(true);
  });

  it("rejects a directory given as the backup", async () => {
    const { dir, config, tool } = setup();
    const live = await openLive(config);
    live.client.close();
    const before = readFileSync(config.dbPath);

    const folder = join(dir, "not-a-file");
    mkdirSync(folder);
    await expect(tool.restore(folder)).rejects.toThrow(new InvalidBackupError(`${folder} is not a regular file`));
    expect(readFileSync(config.dbPath).equals(before)).toBe(true);
  });

  it("rejects an empty file", async () => {
    const { dir, tool } = setup();
    const empty = join(dir, "empty.db");
    writeFileSync(empty, "");
    await expect(tool.restore(empty)).rejects.toThrow(`${empty} is empty`);
  });

  it("fails with SourceNotFoundError when the backup is missing", async () => {
    const { dir, tool } = setup();
    await expect(tool.restore(join(dir, "missing.db"))).rejects.toBeInstanceOf(SourceNotFoundError);
  });
});
