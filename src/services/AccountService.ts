/**
 * Account management on top of the account repository, and the
 * AccountProvider the sync core reads accounts through.
 */

import { NotFoundError } from "../core/errors.js";
import { createChildLogger } from "../core/logger.js";
import { getDb, type DrizzleDb } from "../db/client.js";
import {
  countAccounts,
  getAccountById,
  listAccounts,
  markAccountSynced,
  restoreAccount,
  softDeleteAccount,
  updateAccount,
  upsertAccount,
  type AccountFilter,
  type AccountPatch,
  type AccountRow,
} from "../db/repositories/account.js";
import type { Account, AccountCredentials, AccountProvider } from "./types.js";

const log = createChildLogger("accountService");

export const ACCOUNT_PAGE_SIZE = 500;

export interface AccountView extends Account {
  createdAt: Date;
  updatedAt: Date;
}

export interface AccountInput {
  accountId: string;
  customerId?: string | null;
  credentials: AccountCredentials;
  isActive?: boolean;
}

export interface AccountPage {
  items: AccountView[];
  total: number;
  offset: number;
  limit: number;
  hasMore: boolean;
}

export function toAccount(row: AccountRow): AccountView {
  return {
    accountId: row.accountId,
    customerId: row.customerId,
    isActive: row.isActive,
    lastSyncAt: row.lastSyncAt,
    credentials: row.credentials,
    deletedAt: row.deletedAt,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export async function createOrUpdateAccount(input: AccountInput, db: DrizzleDb = getDb()): Promise<AccountView> {
  const row = await upsertAccount(db, {
    accountId: input.accountId,
    customerId: input.customerId ?? null,
    credentials: input.credentials,
    isActive: input.isActive ?? true,
  });
  if (!row) throw new NotFoundError("Account", input.accountId);
  log.info({ accountId: row.accountId }, "Account saved");
  return toAccount(row);
}

export async function getAccount(
  accountId: string,
  includeDeleted = false,
  db: DrizzleDb = getDb()
): Promise<AccountView> {
  const row = await getAccountById(db, accountId, includeDeleted);
  if (!row) throw new NotFoundError("Account", accountId);
  return toAccount(row);
}

export async function listAccountPage(
  filter: AccountFilter,
  page: { offset: number; limit: number },
  db: DrizzleDb = getDb()
): Promise<AccountPage> {
  const [rows, total] = await Promise.all([listAccounts(db, filter, page), countAccounts(db, filter)]);
  return {
    items: rows.map(toAccount),
    total,
    offset: page.offset,
    limit: page.limit,
    hasMore: page.offset + rows.length < total,
  };
}

export async function patchAccount(
  accountId: string,
  patch: AccountPatch,
  db: DrizzleDb = getDb()
): Promise<AccountView> {
  const row = await updateAccount(db, accountId, patch);
  if (!row) throw new NotFoundError("Account", accountId);
  return toAccount(row);
}

export async function deleteAccount(accountId: string, db: DrizzleDb = getDb()): Promise<void> {
  if (!(await softDeleteAccount(db, accountId))) throw new NotFoundError("Account", accountId);
  log.info({ accountId }, "Account soft-deleted");
}

export async function restoreDeletedAccount(accountId: string, db: DrizzleDb = getDb()): Promise<AccountView> {
  const row = await restoreAccount(db, accountId);
  if (!row) throw new NotFoundError("Deleted account", accountId);
  log.info({ accountId }, "Account restored");
  return toAccount(row);
}

export class DbAccountProvider implements AccountProvider {
  constructor(private readonly db: DrizzleDb = getDb()) {}

  async get(accountId: string): Promise<Account | null> {
    const row = await getAccountById(this.db, accountId, true);
    return row ? toAccount(row) : null;
  }

  /** Every matching account, read a page at a time. */
  async list(activeOnly: boolean): Promise<Account[]> {
    const all: Account[] = [];
    for (let offset = 0; ; offset += ACCOUNT_PAGE_SIZE) {
      const rows = await listAccounts(this.db, { activeOnly }, { offset, limit: ACCOUNT_PAGE_SIZE });
      all.push(...rows.map(toAccount));
      if (rows.length < ACCOUNT_PAGE_SIZE) return all;
    }
  }

  async markSynced(accountId: string, at: Date): Promise<void> {
    await markAccountSynced(this.db, accountId, at);
  }
}
