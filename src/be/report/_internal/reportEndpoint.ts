import { generateKey } from "../../../lib/cache";
import { defineEndpoint } from "../../stream";
import type { ISalesRepository, ReportContext } from "../api";
import { computeAnalytics } from "./analytics";

export const REPORT_FORECAST_TIMEOUT_MS = 2000;

/**
 * Sales report delivered progressively. Part order is fixed, so cursors stay
 * valid for as long as they live.
 */
export const createReportEndpoint = (repository: ISalesRepository) =>
  defineEndpoint<ReportContext>({
    name: "report",
    maxKeysPerRequest: 5,
    carry: (ctx) => ({ user_id: ctx.userId }),
    parts: (registry, ctx) => {
      registry
        .addStatic("meta", { report: "sales", version: 1, scope: ctx.userId ?? "all" })
        .add("orders", () => repository.listOrders(ctx.userId))
        .addCached(
          "analytics",
          async () => computeAnalytics(await repository.listOrders(ctx.userId)),
          {
            ttlSeconds: 600,
            cacheKey: generateKey("partstream", "report", "analytics", ctx.userId),
            dependencies: ["orders"],
          },
        )
        .add(
          "forecast",
          async (_, signal) => repository.forecast(await repository.listOrders(ctx.userId), signal),
          { dependencies: ["analytics"], timeoutMs: REPORT_FORECAST_TIMEOUT_MS },
        )
        .add("inventory", () => repository.listProducts());
    },
  });
