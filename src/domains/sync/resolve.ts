import type { AccountProfile } from "@/domains/ledger";

import type { BalancePolicy } from "./modes";

export type BalanceWinner = "none" | "sheet" | "ledger";

export type ResolutionReason =
  | "equal"
  | "forced"
  | "sheet_newer"
  | "ledger_newer"
  | "timestamps_tied"
  | "only_sheet_timestamp"
  | "only_ledger_timestamp"
  | "no_timestamps";

export interface BalanceResolution {
  winner: BalanceWinner;
  reason: ResolutionReason;
}

export interface BalanceSides {
  sheetBalance: number;
  ledgerBalance: number;
  sheetTimestamp: Date | null;
  ledgerTimestamp: Date | null;
}

export interface ResolveOptions {
  policy: BalancePolicy;
  /** Timestamps this close are treated as tied (ledger wins) */
  clockSkewToleranceMs?: number;
}

/**
 * Decides which side's balance survives.
 *
 * Equal balances never produce a write. Under `newestWins` the later
 * timestamp wins, the ledger wins ties, and a side with the only timestamp
 * wins. With no timestamps at all the ledger wins.
 */
export const resolveBalance = (
  sides: BalanceSides,
  { policy, clockSkewToleranceMs = 0 }: ResolveOptions,
): BalanceResolution => {
  if (sides.sheetBalance === sides.ledgerBalance) {
    return { winner: "none", reason: "equal" };
  }
  if (policy === "sheetWins") {
    return { winner: "sheet", reason: "forced" };
  }
  if (policy === "ledgerWins") {
    return { winner: "ledger", reason: "forced" };
  }

  const { sheetTimestamp, ledgerTimestamp } = sides;
  if (sheetTimestamp && ledgerTimestamp) {
    const deltaMs = sheetTimestamp.getTime() - ledgerTimestamp.getTime();
    if (Math.abs(deltaMs) <= clockSkewToleranceMs) {
      return { winner: "ledger", reason: "timestamps_tied" };
    }
    return deltaMs > 0
      ? { winner: "sheet", reason: "sheet_newer" }
      : { winner: "ledger", reason: "ledger_newer" };
  }
  if (sheetTimestamp) {
    return { winner: "sheet", reason: "only_sheet_timestamp" };
  }
  if (ledgerTimestamp) {
    return { winner: "ledger", reason: "only_ledger_timestamp" };
  }
  return { winner: "ledger", reason: "no_timestamps" };
};

const PROFILE_FIELDS = ["fullName", "phone", "username"] as const;

/**
 * Profile fields the sheet would change on the ledger. Blank sheet cells are
 * ignored so they never erase a ledger value.
 */
export const diffProfile = (
  sheet: AccountProfile,
  ledger: AccountProfile,
): Partial<AccountProfile> => {
  const changes: Partial<AccountProfile> = {};
  for (const field of PROFILE_FIELDS) {
    const value = sheet[field].trim();
    if (value !== "" && value !== ledger[field]) {
      changes[field] = value;
    }
  }
  return changes;
};
