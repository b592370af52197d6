import type { AwilixContainer } from "awilix";
import { Hono } from "hono";
import type { AppEnv } from "../../context";
import { metricNameSchema } from "../../lib/metrics";
import { requireAdmin } from "../../middleware/auth";
import type { Cradle } from "../infra/di";
import { InvalidRequestError } from "../stream";

// Mounting Function (Routes)
export const mountAdminRoutes = (app: Hono<AppEnv>, container: AwilixContainer<Cradle>) => {
  const adminRouter = new Hono<AppEnv>();
  adminRouter.use("*", requireAdmin);

  // GET /api/admin/metrics?name=
  adminRouter.get("/metrics", (c) => {
    const metrics = container.resolve("metrics");
    const name = c.req.query("name");
    if (!name) {
      return c.json({ metrics: metrics.snapshot() });
    }

    const parsed = metricNameSchema.safeParse(name);
    if (!parsed.success) {
      throw new InvalidRequestError(`Unknown metric '${name}'`);
    }
    return c.json({ metrics: { [parsed.data]: metrics.get(parsed.data) } });
  });

  app.route("/api/admin", adminRouter);
};
