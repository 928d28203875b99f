import { Hono } from "hono";
import type { AuditRepo } from "../repositories/audit";
import type { LoginsRepo, UsersRepo } from "../repositories/users";
import type { AppEnv } from "../types";
import type { Logger } from "../utils/logger";
import { verifyPassword } from "../utils/passwords";

const DEFAULT_DEVICE = "web";

type Credentials = { username: string; password: string; deviceId: string };

function readCredentials(body: unknown): Credentials | null {
  if (typeof body !== "object" || body === null) return null;
  const username = "username" in body ? body.username : undefined;
  const password = "password" in body ? body.password : undefined;
  const deviceId = "deviceId" in body ? body.deviceId : undefined;
  if (typeof username !== "string" || username === "") return null;
  if (typeof password !== "string" || password === "") return null;
  if (deviceId !== undefined && typeof deviceId !== "string") return null;
  return { username, password, deviceId: deviceId || DEFAULT_DEVICE };
}

export function makeAuthRouter(deps: { users: UsersRepo; logins: LoginsRepo; audit: AuditRepo; log: Logger }) {
  const app = new Hono<AppEnv>();

  // Checks a password and records the login; no session is issued here
  app.post("/login", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: "Body must be JSON" }, 400);
    }
    const creds = readCredentials(body);
    if (!creds) return c.json({ error: "username and password are required" }, 400);

    const user = await deps.users.get(creds.username);
    if (!user || !verifyPassword(creds.password, user.hashedPassword)) {
      deps.log.warn("login failed", { reqId: c.get("reqId") });
      return c.json({ error: "Invalid credentials" }, 401);
    }

    await deps.logins.add(user.username, creds.deviceId);
    await deps.audit.add({
      actor: user.username,
      ip: c.req.header("x-forwarded-for") || c.req.header("x-real-ip") || "",
      userAgent: c.req.header("user-agent") || "",
      action: "login",
      object: `device:${creds.deviceId}`,
    });

    return c.json({
      username: user.username,
      role: user.role,
      logins: await deps.logins.count(user.username, creds.deviceId),
    });
  });

  // Accounts without their password hashes
  app.get("/users", async (c) => {
    const users = await deps.users.list();
    return c.json(users.map((u) => ({ username: u.username, role: u.role })));
  });

  return app;
}
