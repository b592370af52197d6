import { createMiddleware } from "hono/factory";
import type { AppEnv } from "../context";
import { isJwtConfigured, verifyJwt } from "../lib/jwt";

/**
 * Resolves the caller from a Bearer token. Requests without an Authorization
 * header continue anonymously; a present but invalid token is rejected.
 */
export const optionalAuth = createMiddleware<AppEnv>(async (c, next) => {
  const authHeader = c.req.header("Authorization");
  if (!authHeader || !isJwtConfigured()) {
    c.set("user", null);
    return next();
  }

  const token = authHeader.split(" ")[1]; // Bearer <token>
  if (!token) {
    return c.json({ error: { message: "Unauthorized: Malformed token", code: "unauthorized" } }, 401);
  }

  const payload = await verifyJwt(token);
  if (!payload || typeof payload.sub !== "string") {
    return c.json({ error: { message: "Unauthorized: Invalid token", code: "unauthorized" } }, 401);
  }

  c.set("user", {
    id: payload.sub,
    role: typeof payload.role === "string" ? payload.role : "USER",
  });
  await next();
});

/** Mount after `optionalAuth`. */
export const requireAdmin = createMiddleware<AppEnv>(async (c, next) => {
  const user = c.get("user");
  if (!user) {
    return c.json({ error: { message: "Unauthorized", code: "unauthorized" } }, 401);
  }
  if (user.role !== "ADMIN") {
    return c.json({ error: { message: "Forbidden: Admins only", code: "forbidden" } }, 403);
  }
  await next();
});
