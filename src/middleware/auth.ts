import type { MiddlewareHandler } from "hono";
import type { AppConfig } from "../config";
import type { AppEnv } from "../types";

const PUBLIC_PATHS = new Set(["/api/health-status/public", "/api/auth/login"]);

// API key auth for /api/*
// - Accepts either header: x-api-key: <key>, or authorization: Bearer <key>
// - With no keys configured, requests pass in development and are refused in production
export function createApiKeyAuth(config: Pick<AppConfig, "apiKeys" | "isProduction">): MiddlewareHandler<AppEnv> {
  return async function apiKeyAuth(c, next) {
    const pathname = new URL(c.req.url).pathname;
    if (PUBLIC_PATHS.has(pathname)) {
      return next();
    }

    const fromHeader = c.req.header("x-api-key") || "";
    const auth = c.req.header("authorization") || "";
    const bearer = auth.toLowerCase().startsWith("bearer ") ? auth.slice(7).trim() : "";
    const provided = fromHeader || bearer;

    if (config.apiKeys.length === 0) {
      if (config.isProduction) {
        return c.json({ error: "Unauthorized" }, 401);
      }
      if (provided) c.set("apiKey", provided);
      return next();
    }

    if (!provided || !config.apiKeys.includes(provided)) {
      return c.json({ error: "Unauthorized" }, 401);
    }

    c.set("apiKey", provided);
    await next();
  };
}
