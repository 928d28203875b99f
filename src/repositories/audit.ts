import { and, asc, eq, gte, lte, sql } from "drizzle-orm";
import type { AppDatabase } from "../db/client";
import { auditLog } from "../db/schema";
import { toCsv } from "../utils/csv";
import { redactPii } from "../utils/redact";

export type AuditEntry = {
  actor: string;
  ip: string;
  userAgent: string;
  action: string;
  object: string;
  before?: unknown;
  after?: unknown;
};

export type AuditFilter = { start?: Date; end?: Date; user?: string };

export type AuditRecord = typeof auditLog.$inferSelect;

export const AUDIT_CSV_COLUMNS = ["id", "timestamp", "actor", "ip", "user_agent", "action", "object", "before", "after"] as const;

/** Same shape as SQLite's CURRENT_TIMESTAMP (UTC, second precision). */
export function toSqliteTimestamp(d: Date): string {
  return d.toISOString().replace("T", " ").slice(0, 19);
}

function encode(value: unknown): string | null {
  return value === undefined || value === null ? null : JSON.stringify(redactPii(value));
}

export function createAuditRepo(db: AppDatabase, opts: { retentionDays: number }) {
  async function query(filter: AuditFilter = {}): Promise<AuditRecord[]> {
    return db
      .select()
      .from(auditLog)
      .where(
        and(
          filter.user ? eq(auditLog.actor, filter.user) : undefined,
          filter.start ? gte(auditLog.timestamp, toSqliteTimestamp(filter.start)) : undefined,
          filter.end ? lte(auditLog.timestamp, toSqliteTimestamp(filter.end)) : undefined,
        ),
      )
      .orderBy(asc(auditLog.id));
  }

  return {
    /** Records an entry with PII redacted, then drops rows past the retention window. */
    async add(e: AuditEntry) {
      await db.insert(auditLog).values({
        actor: e.actor,
        ip: e.ip,
        userAgent: e.userAgent,
        action: e.action,
        object: e.object,
        before: encode(e.before),
        after: encode(e.after),
      });
      await db.delete(auditLog).where(sql`${auditLog.timestamp} < datetime('now', ${`-${opts.retentionDays} days`})`);
    },
    query,
    async exportCsv(filter: AuditFilter = {}): Promise<string> {
      const rows = await query(filter);
      return toCsv(
        AUDIT_CSV_COLUMNS,
        rows.map((r) => ({
          id: r.id,
          timestamp: r.timestamp,
          actor: r.actor,
          ip: r.ip,
          user_agent: r.userAgent,
          action: r.action,
          object: r.object,
          before: r.before,
          after: r.after,
        })),
      );
    },
  };
}

export type AuditRepo = ReturnType<typeof createAuditRepo>;
