import { randomBytes } from "node:crypto";
import fs from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";

/** rw------- */
export const OWNER_ONLY = 0o600;

export const SIDECAR_SUFFIXES = ["-wal", "-shm", "-journal"] as const;

export function sidecarPaths(dbPath: string): string[] {
  return SIDECAR_SUFFIXES.map((suffix) => `${dbPath}${suffix}`);
}

export function fileMode(p: string): number {
  return fs.statSync(p).mode & 0o777;
}

/**
 * chmod 600 on the database and whichever sidecars currently exist.
 * Returns the paths that were touched.
 */
export function ensureOwnerOnly(dbPath: string): string[] {
  const touched: string[] = [];
  for (const p of [dbPath, ...sidecarPaths(dbPath)]) {
    if (!fs.existsSync(p)) continue;
    fs.chmodSync(p, OWNER_ONLY);
    touched.push(p);
  }
  return touched;
}

/** A sibling path that shares the target's directory, so rename() stays on one filesystem. */
export function tempPathFor(target: string, tag: string): string {
  const dir = path.dirname(target);
  const base = path.basename(target);
  return path.join(dir, `.${base}.${tag}-${process.pid}-${randomBytes(4).toString("hex")}`);
}

/**
 * Creates `p` exclusively with mode 600. The explicit chmod covers umasks that
 * would strip the owner bits from the open() mode.
 */
export async function createOwnerOnlyFile(p: string): Promise<void> {
  const handle = await fsp.open(p, "wx", OWNER_ONLY);
  try {
    await handle.chmod(OWNER_ONLY);
  } finally {
    await handle.close();
  }
}

export async function fsyncFile(p: string): Promise<void> {
  const handle = await fsp.open(p, "r+");
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
}

/** Removes a file and its SQLite sidecars, ignoring the ones that don't exist. */
export async function removeWithSidecars(p: string): Promise<void> {
  await Promise.all([p, ...sidecarPaths(p)].map((f) => fsp.rm(f, { force: true })));
}

/** Creates an empty 600 file unless `p` already exists; SQLite gives new sidecars the same mode. */
export function touchOwnerOnly(p: string): void {
  if (fs.existsSync(p)) return;
  fs.closeSync(fs.openSync(p, "a", OWNER_ONLY));
  fs.chmodSync(p, OWNER_ONLY);
}
