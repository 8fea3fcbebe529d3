import { type Request, type Response, Router } from "express";
import rateLimit from "express-rate-limit";
import { z } from "zod";
import { NotFoundError, PreconditionError, toHttpError } from "../../core/errors.js";
import { parseOrThrow, queryBoolean } from "../../core/validation.js";
import type { TriggerCoordinator } from "../../jobs/triggerCoordinator.js";
import {
  createOrUpdateAccount,
  deleteAccount,
  getAccount,
  listAccountPage,
  patchAccount,
  restoreDeletedAccount,
  type AccountView,
} from "../../services/AccountService.js";

const credentialsSchema = z
  .record(z.string(), z.string())
  .refine((c) => Object.keys(c).length > 0, "credentials must not be empty");

export const createAccountSchema = z.object({
  account_id: z.string().trim().min(1).max(255),
  customer_id: z.string().uuid().nullable().optional(),
  credentials: credentialsSchema,
  is_active: z.boolean().optional(),
});

export const updateAccountSchema = z
  .object({
    customer_id: z.string().uuid().nullable().optional(),
    credentials: credentialsSchema.optional(),
    is_active: z.boolean().optional(),
  })
  .refine((b) => Object.values(b).some((v) => v !== undefined), "at least one field is required");

export const listAccountsQuerySchema = z.object({
  active_only: queryBoolean,
  include_deleted: queryBoolean,
  offset: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

function paramStr(v: string | string[] | undefined): string | undefined {
  return typeof v === "string" ? v : v?.[0];
}

/** Credentials are write-only; responses only say which keys are set. */
export function accountToJson(a: AccountView) {
  return {
    account_id: a.accountId,
    customer_id: a.customerId,
    is_active: a.isActive,
    last_sync_at: a.lastSyncAt ? a.lastSyncAt.toISOString() : null,
    credential_keys: Object.keys(a.credentials ?? {}).sort(),
    created_at: a.createdAt.toISOString(),
    updated_at: a.updatedAt.toISOString(),
    deleted_at: a.deletedAt ? a.deletedAt.toISOString() : null,
  };
}

function sendError(res: Response, err: unknown): void {
  const { status, body } = toHttpError(err);
  res.status(status).json(body);
}

export interface AccountsRouterDeps {
  coordinator: Pick<TriggerCoordinator, "trigger">;
}

export function createAccountsRouter(deps: AccountsRouterDeps): Router {
  const router = Router();
  const syncLimiter = rateLimit({ windowMs: 60 * 1000, max: 10, standardHeaders: true, legacyHeaders: false });

  router.post("/accounts", async (req: Request, res: Response) => {
    try {
      const body = parseOrThrow(createAccountSchema, req.body, "account");
      const account = await createOrUpdateAccount({
        accountId: body.account_id,
        customerId: body.customer_id,
        credentials: body.credentials,
        isActive: body.is_active,
      });
      res.status(201).json(accountToJson(account));
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get("/accounts", async (req: Request, res: Response) => {
    try {
      const q = parseOrThrow(listAccountsQuerySchema, req.query, "query");
      const page = await listAccountPage(
        { activeOnly: q.active_only, includeDeleted: q.include_deleted },
        { offset: q.offset, limit: q.limit }
      );
      res.json({
        items: page.items.map(accountToJson),
        total: page.total,
        offset: page.offset,
        limit: page.limit,
        has_more: page.hasMore,
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get("/accounts/:accountId", async (req: Request, res: Response) => {
    try {
      const accountId = paramStr(req.params.accountId);
      if (!accountId) throw new NotFoundError("Account", "undefined");
      const includeDeleted = parseOrThrow(queryBoolean, req.query.include_deleted, "query");
      res.json(accountToJson(await getAccount(accountId, includeDeleted)));
    } catch (err) {
      sendError(res, err);
    }
  });

  router.patch("/accounts/:accountId", async (req: Request, res: Response) => {
    try {
      const accountId = paramStr(req.params.accountId);
      if (!accountId) throw new NotFoundError("Account", "undefined");
      const body = parseOrThrow(updateAccountSchema, req.body, "account update");
      const account = await patchAccount(accountId, {
        customerId: body.customer_id,
        credentials: body.credentials,
        isActive: body.is_active,
      });
      res.json(accountToJson(account));
    } catch (err) {
      sendError(res, err);
    }
  });

  router.delete("/accounts/:accountId", async (req: Request, res: Response) => {
    try {
      const accountId = paramStr(req.params.accountId);
      if (!accountId) throw new NotFoundError("Account", "undefined");
      await deleteAccount(accountId);
      res.status(204).end();
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post("/accounts/:accountId/restore", async (req: Request, res: Response) => {
    try {
      const accountId = paramStr(req.params.accountId);
      if (!accountId) throw new NotFoundError("Account", "undefined");
      res.json(accountToJson(await restoreDeletedAccount(accountId)));
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post("/accounts/:accountId/sync", syncLimiter, async (req: Request, res: Response) => {
    try {
      const accountId = paramStr(req.params.accountId);
      if (!accountId) throw new NotFoundError("Account", "undefined");
      const account = await getAccount(accountId);
      if (!account.isActive) {
        throw new PreconditionError(`Account ${accountId} is inactive`, accountId);
      }
      const ack = deps.coordinator.trigger(accountId, "manual");
      res.status(202).json({
        message: ack.accepted ? "Sync started" : "Sync already in progress",
        account_id: accountId,
        accepted: ack.accepted,
        ...(ack.reason && { reason: ack.reason }),
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
