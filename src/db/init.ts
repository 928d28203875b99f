import type { AppConfig } from "../config";
import { createUsersRepo, type NewUser } from "../repositories/users";
import { ensureOwnerOnly } from "../utils/file-mode";
import { silentLogger, type Logger } from "../utils/logger";
import type { DbClient } from "./client";
import { SCHEMA_SQL } from "./schema";

export const DEMO_USERS: readonly NewUser[] = [
  { username: "demo@tradex.local", password: "demo123!", role: "Owner" },
  { username: "demo2@tradex.local", password: "demo456!", role: "User" },
];

/**
 * Creates the tables if needed and, outside production, the demo accounts.
 * Safe to run on every start.
 */
export async function initializeDatabase(
  client: DbClient,
  config: Pick<AppConfig, "seedDemoData">,
  log: Logger = silentLogger,
): Promise<{ seeded: string[] }> {
  client.sqlite.exec(SCHEMA_SQL);

  const seeded: string[] = [];
  if (config.seedDemoData) {
    const usersRepo = createUsersRepo(client.db);
    for (const u of DEMO_USERS) {
      if (await usersRepo.create(u)) seeded.push(u.username);
    }
  }
  ensureOwnerOnly(client.path);

  log.info("database initialized", { path: client.path, seeded: seeded.length });
  return { seeded };
}
