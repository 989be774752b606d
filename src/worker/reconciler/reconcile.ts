/**
 * Timestamp reconciler: one pass over one partition, bringing ledger
 * accounts and sheet rows into agreement.
 *
 * Always run through the sync service, which holds the global
 * reconciliation lock. Live transfers do not take that lock; they are kept
 * safe by the version check on every ledger write made here.
 */

import type { RowFields, SpreadsheetRow } from "@/adapters/types";
import { type Account, REMOVED_STATUSES, isLedgerError, writeConflict } from "@/domains/ledger";
import { SYNC_MODE_STEPS, type SyncModeSteps, formatSheetTimestamp } from "@/domains/sync";
import { toError } from "@/lib/logger";

import { isNoopPlan, planRow } from "./plan";
import {
  DEFAULT_MAX_ROW_ATTEMPTS,
  type ReconcileDeps,
  type ReconcileOptions,
  type ReconcileResult,
  emptyStats,
} from "./types";

type RowOutcome = "updated" | "added" | "skipped";

const toRowFields = (account: Account, timeZone: string): RowFields => ({
  id: account.id,
  fullName: account.fullName,
  phone: account.phone,
  username: account.username,
  balance: account.balance,
  lastUpdated: account.updatedAt ? formatSheetTimestamp(account.updatedAt, timeZone) : "",
});

/**
 * Run a single reconciliation pass.
 *
 * 1. Loads the partition's active students and the sheet rows (either
 *    failure aborts the pass)
 * 2. Deletes rows of deleted/banned accounts
 * 3. Appends rows for active accounts missing from the sheet
 * 4. Walks the rows in sheet order: unknown ids become accounts, known ones
 *    get newest-wins balance resolution and sheet-to-ledger metadata
 *
 * A failure on one row is logged and counted; the pass continues.
 */
export const runReconcile = async (
  deps: ReconcileDeps,
  options: ReconcileOptions,
): Promise<ReconcileResult> => {
  const { ledger, spreadsheet, timeZone } = deps;
  const { sheetName, groupId, mode, signal } = options;
  const clockSkewToleranceMs = deps.clockSkewToleranceMs ?? 0;
  const maxRowAttempts = deps.maxRowAttempts ?? DEFAULT_MAX_ROW_ATTEMPTS;
  const steps: SyncModeSteps = SYNC_MODE_STEPS[mode];
  const logger = deps.logger.child({ sheetName, mode });
  const startedAt = new Date();
  const stats = emptyStats();

  // 1. Load both sides
  const [accounts, read] = await Promise.all([
    ledger.listAccounts(
      groupId === null
        ? { role: "student", status: "active" }
        : { role: "student", status: "active", groupId },
    ),
    spreadsheet.readRows(sheetName),
  ]);

  for (const issue of read.issues) {
    logger.warn("Spreadsheet row issue", { ...issue });
  }

  const active = new Map(accounts.map((account) => [account.id, account]));
  const sheetIds = new Set(read.rows.map((row) => row.id));
  const removedRows = new Set<string>();

  const recordFailure = (id: string, step: string, error: unknown): void => {
    stats.errors++;
    logger.error("Row reconciliation failed", toError(error), { id, step });
  };

  // 2. Cleanup
  if (steps.cleanup) {
    for (const row of read.rows) {
      if (active.has(row.id)) {
        continue;
      }
      signal?.throwIfAborted();
      try {
        const account = await ledger.getAccount(row.id);
        if (account && REMOVED_STATUSES.includes(account.status)) {
          await spreadsheet.deleteRow(sheetName, row.id);
          removedRows.add(row.id);
          stats.deleted++;
          logger.info("Removed row of inactive account", { id: row.id, status: account.status });
        }
      } catch (error) {
        recordFailure(row.id, "cleanup", error);
      }
    }
  }

  // 3. Resurrection
  if (steps.resurrect) {
    for (const account of active.values()) {
      if (sheetIds.has(account.id)) {
        continue;
      }
      signal?.throwIfAborted();
      try {
        await spreadsheet.appendRow(sheetName, toRowFields(account, timeZone));
        stats.added++;
        logger.info("Appended missing row", { id: account.id });
      } catch (error) {
        recordFailure(account.id, "resurrect", error);
      }
    }
  }

  const createFromRow = async (row: SpreadsheetRow): Promise<RowOutcome> => {
    await ledger.createAccount(row.id, {
      fullName: row.fullName,
      phone: row.phone,
      username: row.username,
      balance: row.balance,
      role: "student",
      status: "active",
      groupId,
      updatedAt: row.lastUpdatedAt,
    });
    logger.info("Created account from sheet row", { id: row.id, balance: row.balance });
    return "added";
  };

  const reconcileRow = async (row: SpreadsheetRow, initial: Account): Promise<RowOutcome> => {
    let account = initial;
    for (let attempt = 0; attempt < maxRowAttempts; attempt++) {
      const plan = planRow(row, account, { steps, timeZone, clockSkewToleranceMs });
      if (isNoopPlan(plan)) {
        return "skipped";
      }
      if (plan.sheetUpdate && !plan.ledgerPatch) {
        // A write-back carries no version check of its own
        const fresh = await ledger.getAccount(row.id);
        if (!fresh) {
          return "skipped";
        }
        if (fresh.version !== account.version) {
          logger.debug("Account changed before write-back, re-deciding", { id: row.id, attempt });
          account = fresh;
          continue;
        }
      }
      try {
        if (plan.ledgerPatch) {
          account = await ledger.updateAccount(row.id, plan.ledgerPatch, {
            expectedVersion: account.version,
          });
        }
      } catch (error) {
        if (!isLedgerError(error, "CONCURRENT_WRITE_CONFLICT")) {
          throw error;
        }
        const fresh = await ledger.getAccount(row.id);
        if (!fresh) {
          return "skipped";
        }
        logger.debug("Account changed during reconciliation, re-deciding", { id: row.id, attempt });
        account = fresh;
        continue;
      }
      if (plan.log) {
        await ledger.appendLogEntry(plan.log);
      }
      if (plan.sheetUpdate) {
        await spreadsheet.writeRow(sheetName, row.id, plan.sheetUpdate);
      }
      logger.debug("Row reconciled", {
        id: row.id,
        winner: plan.resolution?.winner,
        reason: plan.resolution?.reason,
      });
      return "updated";
    }
    throw writeConflict(row.id);
  };

  // 4. Per-row resolution
  for (const row of read.rows) {
    if (removedRows.has(row.id)) {
      continue;
    }
    signal?.throwIfAborted();
    try {
      const account = active.get(row.id);
      let outcome: RowOutcome;
      if (account) {
        outcome = await reconcileRow(row, account);
      } else if (!steps.createFromSheet) {
        outcome = "skipped";
      } else {
        const existing = await ledger.getAccount(row.id);
        outcome = existing ? "skipped" : await createFromRow(row);
      }
      stats[outcome]++;
    } catch (error) {
      recordFailure(row.id, "resolve", error);
    }
  }

  const finishedAt = new Date();
  logger.info("Reconciliation pass complete", {
    ...stats,
    issues: read.issues.length,
    durationMs: finishedAt.getTime() - startedAt.getTime(),
  });

  return { sheetName, groupId, mode, stats, issues: read.issues, startedAt, finishedAt };
};
