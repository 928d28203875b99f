import { Hono } from "hono";
import type { AppConfig } from "./config";
import type { DbClient } from "./db/client";
import { createApiKeyAuth } from "./middleware/auth";
import { createRequestLogger, securityHeaders } from "./middleware/logging";
import { createAuditRepo } from "./repositories/audit";
import { createLoginsRepo, createUsersRepo } from "./repositories/users";
import { makeAuditRouter } from "./routes/audit";
import { makeAuthRouter } from "./routes/auth";
import { makeHealthRouter } from "./routes/health";
import type { AppEnv } from "./types";
import type { Logger } from "./utils/logger";

export type AppDeps = {
  config: AppConfig;
  client: DbClient;
  log: Logger;
};

export function createApp({ config, client, log }: AppDeps) {
  const app = new Hono<AppEnv>();

  // Global logging
  app.use("*", createRequestLogger(log.child("http")));
  app.use("*", securityHeaders);

  app.get("/", (c) => c.json({ message: "App is running" }));

  // Secure API routes with auth
  app.use("/api/*", createApiKeyAuth(config));

  const audit = createAuditRepo(client.db, { retentionDays: config.auditRetentionDays });
  const users = createUsersRepo(client.db);
  const logins = createLoginsRepo(client.db);

  app.route("/api", makeHealthRouter({ client, log: log.child("health") }));   // /api/health-status[/public]
  app.route("/api/auth", makeAuthRouter({ users, logins, audit, log: log.child("auth") }));
  app.route("/api/audit", makeAuditRouter(audit));

  return app;
}
