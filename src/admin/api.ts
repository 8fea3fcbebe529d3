/**
 * Account management, manual sync trigger and metric export, mounted under /api/v1.
 */

import { Router } from "express";
import type { TriggerCoordinator } from "../jobs/triggerCoordinator.js";
import type { MetricReader } from "../services/MetricStoreService.js";
import { createAccountsRouter } from "./routes/accounts.js";
import { createMetricsRouter } from "./routes/metrics.js";

export interface ApiDeps {
  coordinator: Pick<TriggerCoordinator, "trigger">;
  store: MetricReader;
}

export function createApiRouter(deps: ApiDeps): Router {
  const router = Router();
  router.use(createAccountsRouter({ coordinator: deps.coordinator }));
  router.use(createMetricsRouter({ store: deps.store }));
  return router;
}
