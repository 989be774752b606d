/**
 * Account lifecycle and ranking for the front end.
 *
 * Every status change is a compare-and-swap write validated against the
 * lifecycle table, retried while it loses races.
 */

import {
  type Account,
  type AccountEvent,
  type AccountRole,
  INITIAL_ACCOUNT_STATUS,
  LedgerError,
  type TransactionLogEntry,
  accountNotFound,
  groupNotFound,
  transitionAccount,
} from "@/domains/ledger";
import { withConflictRetry } from "@/lib/db/conflict-retry";
import type { GroupRepository, LedgerStore } from "@/lib/db/ports";
import type { Logger } from "@/lib/logger";

export interface AccountServiceDeps {
  ledger: LedgerStore;
  groups: GroupRepository;
  logger: Logger;
}

export interface RegisterInput {
  id: string;
  fullName: string;
  phone?: string;
  username?: string;
  role?: AccountRole;
  groupId?: string | null;
}

export interface RankingEntry {
  rank: number;
  id: string;
  fullName: string;
  balance: number;
  groupId: string | null;
}

export interface AccountService {
  getAccount: (id: string) => Promise<Account>;
  register: (input: RegisterInput) => Promise<Account>;
  approve: (id: string) => Promise<Account>;
  reject: (id: string) => Promise<Account>;
  remove: (id: string) => Promise<Account>;
  requestRestore: (id: string) => Promise<Account>;
  approveRestore: (id: string) => Promise<Account>;
  rejectRestore: (id: string) => Promise<Account>;
  assignGroup: (id: string, groupId: string | null) => Promise<Account>;
  /** Log entries naming the account as sender, recipient or actor; newest first */
  getHistory: (id: string, limit?: number) => Promise<TransactionLogEntry[]>;
  /** Active students by balance, highest first; ties by name */
  getRanking: (groupId?: string) => Promise<RankingEntry[]>;
}

export const createAccountService = (deps: AccountServiceDeps): AccountService => {
  const { ledger, groups } = deps;
  const logger = deps.logger.child({ component: "accounts" });

  const getAccount = async (id: string): Promise<Account> => {
    const account = await ledger.getAccount(id);
    if (!account) {
      throw accountNotFound(id);
    }
    return account;
  };

  const requireActiveGroup = async (groupId: string): Promise<void> => {
    const group = await groups.get(groupId);
    if (group?.status !== "active") {
      throw groupNotFound(groupId);
    }
  };

  const register = async (input: RegisterInput): Promise<Account> => {
    const { id, fullName, phone, username, role = "student", groupId = null } = input;
    if (groupId !== null) {
      await requireActiveGroup(groupId);
    }
    const account = await ledger.createAccount(id, {
      fullName,
      phone,
      username,
      role,
      groupId,
      status: INITIAL_ACCOUNT_STATUS,
      balance: 0,
    });
    logger.info("Account registered", { id, role, groupId });
    return account;
  };

  const apply = (event: AccountEvent) => (id: string) =>
    withConflictRetry(async () => {
      const account = await getAccount(id);
      const result = transitionAccount(account, event);
      if (!result.ok) {
        throw new LedgerError(result.error, "INVALID_TRANSITION", id);
      }
      const updated = await ledger.updateAccount(
        id,
        { status: result.state },
        { expectedVersion: account.version },
      );
      logger.info("Account status changed", { id, event, from: result.from, to: result.to });
      return updated;
    });

  const assignGroup = async (id: string, groupId: string | null): Promise<Account> => {
    if (groupId !== null) {
      await requireActiveGroup(groupId);
    }
    return withConflictRetry(async () => {
      const account = await getAccount(id);
      // Keeps updatedAt: moving groups is not a balance edit
      return ledger.updateAccount(
        id,
        { groupId, updatedAt: account.updatedAt },
        { expectedVersion: account.version },
      );
    });
  };

  const getHistory = async (id: string, limit = 20): Promise<TransactionLogEntry[]> => {
    await getAccount(id);
    return ledger.listLogEntries({ accountId: id, limit });
  };

  const getRanking = async (groupId?: string): Promise<RankingEntry[]> => {
    const accounts = await ledger.listAccounts(
      groupId === undefined ? { role: "student", status: "active" } : { role: "student", status: "active", groupId },
    );
    return accounts
      .sort((a, b) => b.balance - a.balance || a.fullName.localeCompare(b.fullName))
      .map((account, index) => ({
        rank: index + 1,
        id: account.id,
        fullName: account.fullName,
        balance: account.balance,
        groupId: account.groupId,
      }));
  };

  return {
    getAccount,
    register,
    approve: apply("approve"),
    reject: apply("reject"),
    remove: apply("remove"),
    requestRestore: apply("requestRestore"),
    approveRestore: apply("approveRestore"),
    rejectRestore: apply("rejectRestore"),
    assignGroup,
    getHistory,
    getRanking,
  };
};
