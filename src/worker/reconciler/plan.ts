import type { SpreadsheetRow } from "@/adapters/types";
import type { Account, AccountPatch } from "@/domains/ledger";
import { type SyncModeSteps, diffProfile, formatSheetTimestamp, resolveBalance } from "@/domains/sync";

import type { RowPlan } from "./types";

export interface PlanOptions {
  steps: SyncModeSteps;
  timeZone: string;
  clockSkewToleranceMs: number;
}

/**
 * Decides the writes for a sheet row whose account is known. Pure: the
 * caller applies the plan under a version check and replans on conflict.
 *
 * A metadata-only ledger write keeps the account's `updatedAt`, so copying a
 * name never makes the ledger look newer than the sheet. A sheet write-back
 * carries the ledger's own `updatedAt`.
 */
export const planRow = (row: SpreadsheetRow, account: Account, options: PlanOptions): RowPlan => {
  const { steps, timeZone, clockSkewToleranceMs } = options;

  const profile = steps.metadata ? diffProfile(row, account) : {};
  const resolution = steps.balances
    ? resolveBalance(
        {
          sheetBalance: row.balance,
          ledgerBalance: account.balance,
          sheetTimestamp: row.lastUpdatedAt,
          ledgerTimestamp: account.updatedAt,
        },
        { policy: steps.balances, clockSkewToleranceMs },
      )
    : null;

  let ledgerPatch: AccountPatch | null = null;
  let sheetUpdate: RowPlan["sheetUpdate"] = null;
  let log: RowPlan["log"] = null;

  if (resolution?.winner === "sheet") {
    ledgerPatch = { ...profile, balance: row.balance };
    log = {
      type: "manual_edit",
      source: "spreadsheet",
      recipientId: account.id,
      amount: row.balance - account.balance,
      oldBalance: account.balance,
      newBalance: row.balance,
      reason: `Spreadsheet edit in row ${row.rowNumber}`,
    };
  } else if (Object.keys(profile).length > 0) {
    ledgerPatch = { ...profile, updatedAt: account.updatedAt };
  }

  if (resolution?.winner === "ledger") {
    sheetUpdate = account.updatedAt
      ? { balance: account.balance, lastUpdated: formatSheetTimestamp(account.updatedAt, timeZone) }
      : { balance: account.balance };
  }

  return { ledgerPatch, sheetUpdate, log, resolution };
};

export const isNoopPlan = (plan: RowPlan): boolean =>
  plan.ledgerPatch === null && plan.sheetUpdate === null;
