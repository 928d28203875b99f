import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types";
import type { Logger } from "../utils/logger";

export function createRequestLogger(log: Logger): MiddlewareHandler<AppEnv> {
  return async function requestLogger(c, next) {
    const start = Date.now();
    const reqId = `${start}-${Math.random().toString(36).slice(2, 8)}`;
    c.set("reqId", reqId);

    const path = new URL(c.req.url).pathname;
    const method = c.req.method;
    const ip = c.req.header("x-forwarded-for") || c.req.header("x-real-ip") || "";

    try {
      await next();
    } finally {
      const ms = Date.now() - start;
      const status = c.res.status;
      const authed = c.get("apiKey") ? "yes" : "no";
      log.info("request", { reqId, method, path, status, ms, ip, authed });
    }
  };
}

// Static hardening headers on every response
export const securityHeaders: MiddlewareHandler<AppEnv> = async (c, next) => {
  await next();
  c.header("X-Content-Type-Options", "nosniff");
  c.header("X-Frame-Options", "DENY");
  c.header("Referrer-Policy", "same-origin");
};
