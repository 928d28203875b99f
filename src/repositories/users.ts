import { and, eq, sql } from "drizzle-orm";
import type { AppDatabase } from "../db/client";
import { logins, users } from "../db/schema";
import { hashPassword } from "../utils/passwords";

export type Role = "Owner" | "Infra" | "User";

export type UserRecord = typeof users.$inferSelect;

export type NewUser = { username: string; password: string; role?: Role };

export function createUsersRepo(db: AppDatabase) {
  return {
    async get(username: string): Promise<UserRecord | null> {
      const rows = await db.select().from(users).where(eq(users.username, username)).limit(1);
      return rows[0] ?? null;
    },
    async list(): Promise<UserRecord[]> {
      return db.select().from(users).orderBy(users.username);
    },
    /** Inserts the user; resolves false when the username is already taken. */
    async create(u: NewUser): Promise<boolean> {
      const res = await db
        .insert(users)
        .values({ username: u.username, hashedPassword: hashPassword(u.password), role: u.role ?? "User" })
        .onConflictDoNothing();
      return res.changes > 0;
    },
  };
}

export function createLoginsRepo(db: AppDatabase) {
  return {
    async add(username: string, deviceId: string) {
      await db.insert(logins).values({ username, deviceId });
    },
    /** Logins recorded for this user from this device. */
    async count(username: string, deviceId: string): Promise<number> {
      const rows = await db
        .select({ n: sql<number>`count(*)` })
        .from(logins)
        .where(and(eq(logins.username, username), eq(logins.deviceId, deviceId)));
      return rows[0]?.n ?? 0;
    },
  };
}

export type UsersRepo = ReturnType<typeof createUsersRepo>;
export type LoginsRepo = ReturnType<typeof createLoginsRepo>;
