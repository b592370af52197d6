import { asValue, type AwilixContainer } from "awilix";
import type { Hono } from "hono";
import type { AppEnv } from "../../context";
import type { Cradle } from "../infra/di";
import { createProgressiveRouter } from "../stream";
import type { ReportContext } from "./api";
import { InMemorySalesRepository } from "./_internal/InMemorySalesRepository";
import { createReportEndpoint } from "./_internal/reportEndpoint";
import sampleData from "./_internal/sample-data.json";

// Public API
export * from "./api";
export { InMemorySalesRepository } from "./_internal/InMemorySalesRepository";

// Registration Function (Services)
export const registerReportDomain = (container: AwilixContainer<Cradle>) => {
  container.register({
    salesRepository: asValue(new InMemorySalesRepository(sampleData)),
  });
};

// Mounting Function (Routes)
export const mountReportRoutes = (app: Hono<AppEnv>, container: AwilixContainer<Cradle>) => {
  const endpoint = createReportEndpoint(container.resolve("salesRepository"));
  const router = createProgressiveRouter<AppEnv, ReportContext>(
    container.resolve("progressiveService"),
    endpoint,
    { resolveContext: (c) => ({ userId: c.get("user")?.id ?? null }) },
  );
  app.route("/api/report", router);
};
