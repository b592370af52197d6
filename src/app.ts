import type { AwilixContainer } from "awilix";
import { Hono } from "hono";
import { cors } from "hono/cors";
import { mountAdminRoutes } from "./be/admin";
import { mountReportRoutes } from "./be/report";
import type { Cradle } from "./be/infra/di";
import { handleProgressiveError } from "./be/stream";
import type { AppEnv } from "./context";
import { optionalAuth } from "./middleware/auth";
import { rateLimiter } from "./middleware/rateLimiter";

export type AppOptions = {
  frontendUrl?: string | null;
};

export const createApp = (container: AwilixContainer<Cradle>, { frontendUrl }: AppOptions = {}) => {
  const app = new Hono<AppEnv>();

  app.use("/api/*", cors({
    origin: frontendUrl || "*",
    allowMethods: ["GET", "POST", "OPTIONS"],
    allowHeaders: ["Content-Type", "Authorization"],
    exposeHeaders: ["Content-Length", "X-RateLimit-Remaining"],
    maxAge: 600,
  }));
  app.use("/api/*", optionalAuth);
  app.use("/api/*", rateLimiter);

  app.get("/api/health", (c) => c.json({ status: "ok" }));

  // Mount Routes
  mountReportRoutes(app, container);
  mountAdminRoutes(app, container);

  app.onError(handleProgressiveError);

  return app;
};
