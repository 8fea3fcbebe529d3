/**
 * Express application: health probe, Prometheus metrics and, in admin and
 * hybrid modes, the /api/v1 routes.
 */

import express from "express";
import helmet from "helmet";
import { createApiRouter } from "./admin/api.js";
import type { ServiceMode } from "./core/config/types.js";
import { ValidationError, toHttpError } from "./core/errors.js";
import { httpRequestDuration, registry } from "./core/metrics.js";
import { requestId, requestLogger } from "./core/requestId.js";
import type { TriggerCoordinator } from "./jobs/triggerCoordinator.js";
import type { MetricReader } from "./services/MetricStoreService.js";

export interface AppDeps {
  mode: ServiceMode;
  coordinator: Pick<TriggerCoordinator, "trigger" | "running">;
  store: MetricReader;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  app.use(helmet());
  app.use(requestId);
  app.use((req, res, next) => {
    const end = httpRequestDuration.startTimer({ method: req.method });
    res.on("finish", () => {
      end({ path: req.baseUrl || req.path, status: String(res.statusCode) });
    });
    next();
  });

  app.get("/health", (_req, res) => {
    res.json({
      status: "healthy",
      mode: deps.mode,
      uptime: process.uptime(),
      running_syncs: deps.coordinator.running().map((r) => ({
        account_id: r.accountId,
        source: r.source,
        started_at: r.startedAt.toISOString(),
      })),
    });
  });
  app.get("/metrics", async (_req, res) => {
    res.set("Content-Type", registry.contentType);
    res.end(await registry.metrics());
  });

  app.use(express.json());

  if (deps.mode === "admin" || deps.mode === "hybrid") {
    app.use("/api/v1", createApiRouter({ coordinator: deps.coordinator, store: deps.store }));
  }

  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const { status, body } = toHttpError(err instanceof SyntaxError ? new ValidationError("Malformed JSON body") : err);
    if (status >= 500) requestLogger(req).error({ err }, "Unhandled request error");
    res.status(status).json(body);
  });

  return app;
}
