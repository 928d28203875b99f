import { Hono } from "hono";
import type { DbClient } from "../db/client";
import { errorMessage } from "../errors";
import type { AppEnv } from "../types";
import type { Logger } from "../utils/logger";

export function makeHealthRouter(deps: { client: DbClient; log: Logger }) {
  const app = new Hono<AppEnv>();

  // Liveness only; no auth, no details
  app.get("/health-status/public", (c) => c.json({ status: "alive" }));

  app.post("/health-status", (c) => {
    const checks: Record<string, string> = {};
    try {
      deps.client.sqlite.prepare("SELECT 1").get();
      checks.database = "ok";
    } catch (err) {
      checks.database = `error: ${errorMessage(err)}`;
    }
    deps.log.info("health checks executed", { checks });
    return c.json({ status: "alive", checks });
  });

  return app;
}
