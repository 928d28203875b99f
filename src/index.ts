import { serve } from "@hono/node-server";
import dotenv from "dotenv";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { openDbClient } from "./db/client";
import { initializeDatabase } from "./db/init";
import { createLogger } from "./utils/logger";

// Load environment variables from .env file (only needed for local development)
if (process.env.TRADEX_ENV !== "production") {
  dotenv.config({ path: ".env.development.local" });
}

async function main() {
  const config = loadConfig();
  const log = createLogger("tradex", { level: config.logLevel });

  const client = openDbClient(config);
  await initializeDatabase(client, config, log);

  const app = createApp({ config, client, log });
  const server = serve({ fetch: app.fetch, port: config.port });
  log.info(`App is running on port ${config.port}`, { db: config.dbPath, env: config.environment });

  const shutdown = (signal: string) => {
    log.info("shutting down", { signal });
    server.close(() => {
      client.close();
      process.exit(0);
    });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
