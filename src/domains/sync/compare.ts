export interface RosterEntry {
  id: string;
  fullName: string;
  balance: number;
}

export interface BalanceMismatch {
  id: string;
  fullName: string;
  sheetBalance: number;
  ledgerBalance: number;
}

export interface RosterComparison {
  /** Ids on the sheet with no active ledger account, in sheet order */
  onlyInSheet: string[];
  /** Active ledger accounts missing from the sheet, in ledger order */
  onlyInLedger: string[];
  balanceMismatches: BalanceMismatch[];
  /** Ids present on both sides with equal balances */
  matched: number;
}

/**
 * Read-only diff of a sheet roster against the ledger. A repeated sheet id
 * is compared once, using its first row.
 */
export const compareRosters = (sheet: RosterEntry[], ledger: RosterEntry[]): RosterComparison => {
  const ledgerById = new Map(ledger.map((entry) => [entry.id, entry]));
  const seen = new Set<string>();
  const onlyInSheet: string[] = [];
  const balanceMismatches: BalanceMismatch[] = [];
  let matched = 0;

  for (const row of sheet) {
    if (seen.has(row.id)) {
      continue;
    }
    seen.add(row.id);

    const account = ledgerById.get(row.id);
    if (!account) {
      onlyInSheet.push(row.id);
    } else if (account.balance !== row.balance) {
      balanceMismatches.push({
        id: row.id,
        fullName: account.fullName,
        sheetBalance: row.balance,
        ledgerBalance: account.balance,
      });
    } else {
      matched++;
    }
  }

  const onlyInLedger = ledger.filter((entry) => !seen.has(entry.id)).map((entry) => entry.id);

  return { onlyInSheet, onlyInLedger, balanceMismatches, matched };
};
