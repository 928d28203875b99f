import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

// users
export const users = sqliteTable("users", {
  username: text("username").primaryKey(),
  hashedPassword: text("hashed_password").notNull(),
  role: text("role").notNull().default("User"), // Owner | Infra | User
});

export const logins = sqliteTable("logins", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  username: text("username").notNull(),
  deviceId: text("device_id").notNull(),
  loginTime: text("login_time").default(sql`CURRENT_TIMESTAMP`),
});

// audit trail; before/after hold redacted json
export const auditLog = sqliteTable("audit_log", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  timestamp: text("timestamp").default(sql`CURRENT_TIMESTAMP`),
  actor: text("actor"),
  ip: text("ip"),
  userAgent: text("user_agent"),
  action: text("action"),
  object: text("object"),
  before: text("before"),
  after: text("after"),
});

/**
 * DDL for the tables above, plus device_usage, which no code path writes yet
 * but existing databases carry. drizzle only queries, it doesn't migrate here.
 */
export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS users (
    username TEXT PRIMARY KEY,
    hashed_password TEXT NOT NULL,
    role TEXT NOT NULL DEFAULT 'User'
  );
  CREATE TABLE IF NOT EXISTS logins (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    username TEXT NOT NULL,
    device_id TEXT NOT NULL,
    login_time TIMESTAMP DEFAULT CURRENT_TIMESTAMP
  );
  CREATE TABLE IF NOT EXISTS device_usage (
    username TEXT NOT NULL,
    device_id TEXT NOT NULL,
    quote_count INTEGER DEFAULT 0,
    first_access TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
    PRIMARY KEY (username, device_id)
  );
  CREATE TABLE IF NOT EXISTS audit_log (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    timestamp TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
    actor TEXT,
    ip TEXT,
    user_agent TEXT,
    action TEXT,
    object TEXT,
    before TEXT,
    after TEXT
  );
`;
