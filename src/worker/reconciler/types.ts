/**
 * Reconciler types and defaults.
 */

import type { RowIssue, SpreadsheetAdapter } from "@/adapters/types";
import type { AccountPatch, NewLogEntry } from "@/domains/ledger";
import type { BalanceResolution, SyncMode } from "@/domains/sync";
import type { LedgerStore } from "@/lib/db/ports";
import type { Logger } from "@/lib/logger";

export interface ReconcileDeps {
  ledger: LedgerStore;
  spreadsheet: SpreadsheetAdapter;
  logger: Logger;
  /** IANA zone of the sheet's LastUpdated column */
  timeZone: string;
  clockSkewToleranceMs?: number;
  /** Attempts per row before a lost compare-and-swap counts as an error */
  maxRowAttempts?: number;
}

export interface ReconcileOptions {
  sheetName: string;
  /** null reconciles the legacy single sheet without a group filter */
  groupId: string | null;
  mode: SyncMode;
  /** Checked between rows */
  signal?: AbortSignal;
}

export interface ReconcileStats {
  updated: number;
  added: number;
  deleted: number;
  skipped: number;
  errors: number;
}

export interface ReconcileResult {
  sheetName: string;
  groupId: string | null;
  mode: SyncMode;
  stats: ReconcileStats;
  issues: RowIssue[];
  startedAt: Date;
  finishedAt: Date;
}

/**
 * Writes needed to bring one row and its account into agreement.
 */
export interface RowPlan {
  ledgerPatch: AccountPatch | null;
  sheetUpdate: { balance: number; lastUpdated?: string } | null;
  log: NewLogEntry | null;
  resolution: BalanceResolution | null;
}

export const DEFAULT_MAX_ROW_ATTEMPTS = 3;

export const emptyStats = (): ReconcileStats => ({
  updated: 0,
  added: 0,
  deleted: 0,
  skipped: 0,
  errors: 0,
});

export const addStats = (a: ReconcileStats, b: ReconcileStats): ReconcileStats => ({
  updated: a.updated + b.updated,
  added: a.added + b.added,
  deleted: a.deleted + b.deleted,
  skipped: a.skipped + b.skipped,
  errors: a.errors + b.errors,
});
