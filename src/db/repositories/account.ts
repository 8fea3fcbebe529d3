import { and, asc, count, eq, isNotNull, isNull, type SQL } from "drizzle-orm";
import type { DrizzleDb } from "../client.js";
import { accounts } from "../schema.js";

export type AccountRow = typeof accounts.$inferSelect;
export type AccountInsert = typeof accounts.$inferInsert;

export interface AccountFilter {
  activeOnly?: boolean;
  includeDeleted?: boolean;
}

function filterConditions(filter: AccountFilter): SQL | undefined {
  const conditions: SQL[] = [];
  if (filter.activeOnly) conditions.push(eq(accounts.isActive, true));
  if (!filter.includeDeleted) conditions.push(isNull(accounts.deletedAt));
  return conditions.length > 0 ? and(...conditions) : undefined;
}

export async function getAccountById(
  db: DrizzleDb,
  accountId: string,
  includeDeleted = false
): Promise<AccountRow | undefined> {
  const byId = eq(accounts.accountId, accountId);
  const rows = await db
    .select()
    .from(accounts)
    .where(includeDeleted ? byId : and(byId, isNull(accounts.deletedAt)))
    .limit(1);
  return rows[0];
}

export async function listAccounts(
  db: DrizzleDb,
  filter: AccountFilter = {},
  page: { offset: number; limit: number } = { offset: 0, limit: 1000 }
): Promise<AccountRow[]> {
  return db
    .select()
    .from(accounts)
    .where(filterConditions(filter))
    .orderBy(asc(accounts.accountId))
    .offset(page.offset)
    .limit(page.limit);
}

export async function countAccounts(db: DrizzleDb, filter: AccountFilter = {}): Promise<number> {
  const rows = await db.select({ total: count() }).from(accounts).where(filterConditions(filter));
  return rows[0]?.total ?? 0;
}

/** Insert, or update every supplied field of an existing (possibly soft-deleted) account. */
export async function upsertAccount(db: DrizzleDb, row: AccountInsert): Promise<AccountRow | undefined> {
  const now = new Date();
  const rows = await db
    .insert(accounts)
    .values({ ...row, createdAt: now, updatedAt: now })
    .onConflictDoUpdate({
      target: accounts.accountId,
      set: {
        customerId: row.customerId,
        credentials: row.credentials,
        isActive: row.isActive ?? true,
        deletedAt: null,
        updatedAt: now,
      },
    })
    .returning();
  return rows[0];
}

export type AccountPatch = Partial<Pick<AccountInsert, "customerId" | "credentials" | "isActive">>;

export async function updateAccount(
  db: DrizzleDb,
  accountId: string,
  patch: AccountPatch
): Promise<AccountRow | undefined> {
  const rows = await db
    .update(accounts)
    .set({ ...patch, updatedAt: new Date() })
    .where(and(eq(accounts.accountId, accountId), isNull(accounts.deletedAt)))
    .returning();
  return rows[0];
}

export async function softDeleteAccount(db: DrizzleDb, accountId: string): Promise<boolean> {
  const now = new Date();
  const rows = await db
    .update(accounts)
    .set({ deletedAt: now, isActive: false, updatedAt: now })
    .where(and(eq(accounts.accountId, accountId), isNull(accounts.deletedAt)))
    .returning({ accountId: accounts.accountId });
  return rows.length > 0;
}

export async function restoreAccount(db: DrizzleDb, accountId: string): Promise<AccountRow | undefined> {
  const rows = await db
    .update(accounts)
    .set({ deletedAt: null, isActive: true, updatedAt: new Date() })
    .where(and(eq(accounts.accountId, accountId), isNotNull(accounts.deletedAt)))
    .returning();
  return rows[0];
}

/** The only write the sync path makes to an account. */
export async function markAccountSynced(db: DrizzleDb, accountId: string, at: Date): Promise<void> {
  await db.update(accounts).set({ lastSyncAt: at }).where(eq(accounts.accountId, accountId));
}
