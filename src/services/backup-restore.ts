import fs from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import type { AppConfig } from "../config";
import type { StorageBackend } from "../db/backends";
import {
  InvalidBackupError,
  IOError,
  SourceNotFoundError,
  errorMessage,
  toTradexDbError,
} from "../errors";
import {
  OWNER_ONLY,
  createOwnerOnlyFile,
  ensureOwnerOnly,
  fsyncFile,
  removeWithSidecars,
  sidecarPaths,
  tempPathFor,
} from "../utils/file-mode";
import { silentLogger, type Logger } from "../utils/logger";

export type BackupResult = { destination: string; bytes: number; durationMs: number };
export type RestoreResult = { target: string; bytes: number; durationMs: number };

/**
 * Snapshots the live database to a file and puts such a file back in place.
 *
 * Both directions write into a temporary sibling of the final path and only
 * rename it over the target once the copy has been checked and fsynced, so an
 * interrupted run leaves either the old file or the new one, never a mix.
 * Restore expects the server to be stopped; backup does not.
 */
export class BackupRestoreTool {
  private readonly log: Logger;

  constructor(
    private readonly config: Pick<AppConfig, "dbPath">,
    private readonly backend: StorageBackend,
    log: Logger = silentLogger,
  ) {
    this.log = log.child("backup");
  }

  async backup(destination: string): Promise<BackupResult> {
    const started = Date.now();
    const source = this.config.dbPath;
    const dest = path.resolve(destination);

    if (!fs.existsSync(source)) {
      throw new SourceNotFoundError(`database not found at ${source}`);
    }
    if (dest === source) {
      throw new IOError(`refusing to back up ${source} onto itself`);
    }

    let tmp: string | null = null;
    try {
      await fsp.mkdir(path.dirname(dest), { recursive: true });
      tmp = tempPathFor(dest, "backup");
      await createOwnerOnlyFile(tmp);
      await this.snapshotLive(tmp);

      const problem = this.checkAndDetach(tmp);
      if (problem) {
        throw new IOError(`snapshot of ${source} failed integrity check: ${problem}`);
      }

      await fsyncFile(tmp);
      await fsp.rename(tmp, dest);
      tmp = null;
      await fsp.chmod(dest, OWNER_ONLY);
    } catch (err) {
      if (tmp) await this.discard(tmp);
      throw toTradexDbError(err, `backup to ${dest} failed`);
    }

    const { size } = await fsp.stat(dest);
    const result = { destination: dest, bytes: size, durationMs: Date.now() - started };
    this.log.info("backup complete", { source, ...result, backend: this.backend.kind });
    return result;
  }

  async restore(source: string, target: string = this.config.dbPath): Promise<RestoreResult> {
    const started = Date.now();
    const from = path.resolve(source);
    const to = path.resolve(target);

    if (!fs.existsSync(from)) {
      throw new SourceNotFoundError(`backup not found at ${from}`);
    }
    if (from === to) {
      throw new IOError(`refusing to restore ${from} onto itself`);
    }

    let tmp: string | null = null;
    try {
      const stat = await fsp.stat(from);
      if (!stat.isFile()) throw new InvalidBackupError(`${from} is not a regular file`);
      if (stat.size === 0) throw new InvalidBackupError(`${from} is empty`);
      await this.backend.validateHeader(from);

      await fsp.mkdir(path.dirname(to), { recursive: true, mode: 0o700 });
      tmp = tempPathFor(to, "restore");
      await createOwnerOnlyFile(tmp);
      await pipeline(fs.createReadStream(from), fs.createWriteStream(tmp, { flags: "r+" }));
      await fsyncFile(tmp);

      let problem: string | null;
      try {
        problem = this.checkAndDetach(tmp);
      } catch (err) {
        throw toTradexDbError(err, `${from} is not a valid database`, InvalidBackupError);
      }
      if (problem) {
        throw new InvalidBackupError(`${from} failed integrity check: ${problem}`);
      }

      // A leftover WAL or hot journal would be replayed onto the restored file.
      await Promise.all(sidecarPaths(to).map((p) => fsp.rm(p, { force: true })));
      await fsp.rename(tmp, to);
      tmp = null;
      await fsp.chmod(to, OWNER_ONLY);
      this.reinitializeWal(to);
    } catch (err) {
      if (tmp) await this.discard(tmp);
      throw toTradexDbError(err, `restore from ${from} failed`);
    }

    const { size } = await fsp.stat(to);
    const result = { target: to, bytes: size, durationMs: Date.now() - started };
    this.log.info("restore complete", { source: from, ...result, backend: this.backend.kind });
    return result;
  }

  // FULL waits (up to the busy timeout) for concurrent writers, then folds the
  // whole WAL into the main file before the page copy starts.
  private async snapshotLive(tmp: string): Promise<void> {
    const source = this.config.dbPath;
    const db = this.backend.open(source, { fileMustExist: true });
    try {
      db.pragma("wal_checkpoint(FULL)");
      await this.backend.snapshot(db, tmp);
    } finally {
      db.close();
      ensureOwnerOnly(source);
    }
  }

  /**
   * Runs quick_check on a standalone copy and switches it to a rollback
   * journal so the file carries no dependency on -wal/-shm siblings.
   * Returns the check's complaint, or null when the file is sound.
   */
  private checkAndDetach(file: string): string | null {
    const db = this.backend.open(file, { fileMustExist: true });
    try {
      const result = db.pragma("quick_check", { simple: true });
      if (result !== "ok") return String(result);
      db.pragma("journal_mode = DELETE");
      return null;
    } finally {
      db.close();
    }
  }

  private reinitializeWal(file: string): void {
    const db = this.backend.open(file, { fileMustExist: true });
    try {
      db.pragma("journal_mode = WAL");
    } finally {
      db.close();
      ensureOwnerOnly(file);
    }
  }

  private async discard(tmp: string): Promise<void> {
    try {
      await removeWithSidecars(tmp);
    } catch (err) {
      this.log.warn("could not remove temporary file", { path: tmp, error: errorMessage(err) });
    }
  }
}
