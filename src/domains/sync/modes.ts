import * as v from "valibot";

export const syncModeSchema = v.picklist([
  "bidirectional",
  "namesOnly",
  "pointsOnly",
  "forceSheetToLedger",
  "forceLedgerToSheet",
]);
export type SyncMode = v.InferOutput<typeof syncModeSchema>;

export type BalancePolicy = "newestWins" | "sheetWins" | "ledgerWins";

/**
 * Which reconciliation steps a mode runs. Every mode walks the partition the
 * same way; modes only switch steps off.
 */
export interface SyncModeSteps {
  /** Delete sheet rows of deleted/banned accounts */
  cleanup: boolean;
  /** Append rows for active accounts missing from the sheet */
  resurrect: boolean;
  /** Create ledger accounts for sheet rows with unknown ids */
  createFromSheet: boolean;
  /** null = leave balances alone */
  balances: BalancePolicy | null;
  /** Copy name/phone/username from sheet to ledger */
  metadata: boolean;
}

export const SYNC_MODE_STEPS: Record<SyncMode, SyncModeSteps> = {
  bidirectional: {
    cleanup: true,
    resurrect: true,
    createFromSheet: true,
    balances: "newestWins",
    metadata: true,
  },
  namesOnly: {
    cleanup: false,
    resurrect: false,
    createFromSheet: true,
    balances: null,
    metadata: true,
  },
  pointsOnly: {
    cleanup: true,
    resurrect: true,
    createFromSheet: true,
    balances: "newestWins",
    metadata: false,
  },
  forceSheetToLedger: {
    cleanup: false,
    resurrect: false,
    createFromSheet: true,
    balances: "sheetWins",
    metadata: true,
  },
  forceLedgerToSheet: {
    cleanup: true,
    resurrect: true,
    createFromSheet: false,
    balances: "ledgerWins",
    metadata: false,
  },
};
