import { Hono, type Context } from "hono";
import type { AuditFilter, AuditRepo } from "../repositories/audit";
import type { AppEnv } from "../types";

const ZONE_SUFFIX = /(?:z|[+-]\d{2}:?\d{2})$/i;
const DECODED_PLUS_OFFSET = / (\d{2}:?\d{2})$/;

/**
 * ISO-8601 date or date-time. Date-times without an offset are read as UTC,
 * matching what SQLite's CURRENT_TIMESTAMP stores.
 */
export function parseTimestamp(value: string): Date | null {
  let v = value.trim();
  if (v[10] === " ") v = `${v.slice(0, 10)}T${v.slice(11)}`;
  // an unencoded "+hh:mm" offset arrives with the plus decoded to a space
  v = v.replace(DECODED_PLUS_OFFSET, "+$1");
  if (v.includes("T") && !ZONE_SUFFIX.test(v)) v += "Z";
  const d = new Date(v);
  return Number.isNaN(d.getTime()) ? null : d;
}

function parseFilter(c: Context<AppEnv>): AuditFilter | { error: string } {
  const filter: AuditFilter = {};
  for (const key of ["start", "end"] as const) {
    const raw = c.req.query(key);
    if (!raw) continue;
    const d = parseTimestamp(raw);
    if (!d) return { error: `invalid ${key} timestamp` };
    filter[key] = d;
  }
  const user = c.req.query("user");
  if (user) filter.user = user;
  return filter;
}

export function makeAuditRouter(audit: AuditRepo) {
  const app = new Hono<AppEnv>();

  app.get("/logs", async (c) => {
    const filter = parseFilter(c);
    if ("error" in filter) return c.json({ error: filter.error }, 400);
    return c.json(await audit.query(filter));
  });

  app.get("/logs/export", async (c) => {
    const filter = parseFilter(c);
    if ("error" in filter) return c.json({ error: filter.error }, 400);
    const csv = await audit.exportCsv(filter);
    return c.body(csv, 200, {
      "Content-Type": "text/csv",
      "Content-Disposition": "attachment; filename=audit.csv",
    });
  });

  return app;
}
