/**
 * Group registry: keeps Group records in step with the spreadsheet's tabs.
 *
 * Tab names are read through a short-lived cache. A refresh diffs the tab
 * list against the last known one (or, after a restart, the persisted active
 * groups) and applies additions, removals and renames to the records and to
 * account `groupId`s.
 */

import { LRUCache } from "lru-cache";

import type { SpreadsheetAdapter } from "@/adapters/types";
import { type Account, groupAlreadyExists, groupNotFound } from "@/domains/ledger";
import {
  type Group,
  type RenameDetection,
  diffPartitions,
  filterPartitionNames,
  isEmptyDiff,
} from "@/domains/partition";
import type { GroupRepository, LedgerStore } from "@/lib/db/ports";
import { type Logger, toError } from "@/lib/logger";

export interface GroupRegistryDeps {
  groups: GroupRepository;
  ledger: LedgerStore;
  spreadsheet: SpreadsheetAdapter;
  logger: Logger;
  ignoredTabs?: readonly string[];
  renameDetection?: RenameDetection;
  /** 0 disables caching */
  cacheTtlMs?: number;
}

export interface GroupRegistry {
  /** Active groups in tab order */
  listPartitions: (forceRefresh?: boolean) => Promise<Group[]>;
  renamePartition: (oldName: string, newName: string) => Promise<Group>;
  createPartition: (name: string) => Promise<Group>;
  setPartitionHidden: (name: string, hidden: boolean) => Promise<Group>;
  /** Active accounts whose group no longer has a tab */
  findOrphanedAccounts: (forceRefresh?: boolean) => Promise<Account[]>;
  /** Hard-deletes orphaned accounts; returns their ids */
  purgeOrphanedAccounts: () => Promise<string[]>;
  invalidate: () => void;
}

const CACHE_KEY = "partitions";

export const createGroupRegistry = (deps: GroupRegistryDeps): GroupRegistry => {
  const {
    groups,
    ledger,
    spreadsheet,
    ignoredTabs = [],
    renameDetection = "heuristic",
    cacheTtlMs = 60_000,
  } = deps;
  const logger = deps.logger.child({ component: "group-registry" });

  // Date.now keeps the TTL under fake timers
  const cache = new LRUCache<string, string[]>({
    max: 1,
    ...(cacheTtlMs > 0 && { ttl: cacheTtlMs }),
    perf: {
      now: () => Date.now(),
    },
  });
  let lastKnown: string[] | null = null;
  let refreshing: Promise<string[]> | null = null;

  const remember = (names: string[]): void => {
    lastKnown = names;
    if (cacheTtlMs > 0) {
      cache.set(CACHE_KEY, names);
    }
  };

  /**
   * Creates the record, or re-activates a deleted one.
   */
  const ensureActive = async (name: string): Promise<void> => {
    const existing = await groups.get(name);
    if (!existing) {
      await groups.create({ id: name });
      logger.info("Registered new partition", { name });
    } else if (existing.status !== "active") {
      await groups.update(name, { status: "active" });
      logger.info("Re-activated partition", { name });
    }
  };

  /**
   * Moves the record and its accounts to the new id.
   */
  const moveGroup = async (from: string, to: string): Promise<Group> => {
    const group = await groups.get(from);
    if (!group) {
      await ensureActive(to);
      const created = await groups.get(to);
      if (!created) {
        throw groupNotFound(to);
      }
      return created;
    }
    const displayName = group.displayName === from ? to : group.displayName;
    const moved = await groups.changeId(from, to, displayName);
    const accounts = await ledger.reassignGroup(from, to);
    logger.info("Partition renamed", { from, to, accounts });
    return moved;
  };

  const refresh = async (): Promise<string[]> => {
    const names = filterPartitionNames(await spreadsheet.listPartitionNames(), ignoredTabs);
    const previous =
      lastKnown ?? (await groups.list({ status: "active" })).map((group) => group.id);
    const diff = diffPartitions(previous, names, renameDetection);

    if (!isEmptyDiff(diff)) {
      logger.info("Partition set changed", { ...diff });
    }
    if (diff.renamed) {
      await moveGroup(diff.renamed.from, diff.renamed.to);
    }
    for (const name of diff.removed) {
      if (await groups.get(name)) {
        await groups.update(name, { status: "deleted" });
        logger.warn("Partition tab removed; group marked deleted", { name });
      }
    }
    for (const name of names) {
      await ensureActive(name);
    }

    remember(names);
    return names;
  };

  const partitionNames = async (forceRefresh: boolean): Promise<string[]> => {
    const cached = forceRefresh ? undefined : cache.get(CACHE_KEY);
    if (cached) {
      return cached;
    }
    if (!refreshing) {
      refreshing = refresh().finally(() => {
        refreshing = null;
      });
    }
    return refreshing;
  };

  const listPartitions = async (forceRefresh = false): Promise<Group[]> => {
    const names = await partitionNames(forceRefresh);
    const records = await groups.list({ status: "active" });
    const byId = new Map(records.map((group) => [group.id, group]));
    return names.flatMap((name) => {
      const group = byId.get(name);
      return group ? [group] : [];
    });
  };

  const activeGroup = async (name: string): Promise<Group | null> => {
    const group = await groups.get(name);
    return group?.status === "active" ? group : null;
  };

  const renamePartition = async (oldName: string, newName: string): Promise<Group> => {
    if (!(await activeGroup(oldName))) {
      throw groupNotFound(oldName);
    }
    if (await activeGroup(newName)) {
      throw groupAlreadyExists(newName);
    }
    await spreadsheet.renamePartition(oldName, newName);
    const moved = await moveGroup(oldName, newName);
    if (lastKnown) {
      remember(lastKnown.map((name) => (name === oldName ? newName : name)));
    }
    return moved;
  };

  const createPartition = async (name: string): Promise<Group> => {
    const existing = await groups.get(name);
    if (existing?.status === "active") {
      throw groupAlreadyExists(name);
    }
    const group = existing
      ? await groups.update(name, { status: "active" })
      : await groups.create({ id: name });

    try {
      await spreadsheet.createPartition(name);
    } catch (error) {
      logger.error("Creating partition tab failed; rolling back group record", toError(error), {
        name,
      });
      if (existing) {
        await groups.update(name, { status: existing.status });
      } else {
        await groups.delete(name);
      }
      throw error;
    }

    if (lastKnown) {
      remember([...lastKnown, name]);
    }
    logger.info("Partition created", { name });
    return group;
  };

  const setPartitionHidden = (name: string, hidden: boolean): Promise<Group> =>
    groups.update(name, { hidden });

  const findOrphanedAccounts = async (forceRefresh = false): Promise<Account[]> => {
    const valid = new Set(await partitionNames(forceRefresh));
    const accounts = await ledger.listAccounts({ status: "active" });
    return accounts.filter((account) => account.groupId !== null && !valid.has(account.groupId));
  };

  const purgeOrphanedAccounts = async (): Promise<string[]> => {
    const orphans = await findOrphanedAccounts(true);
    for (const account of orphans) {
      await ledger.deleteAccount(account.id);
    }
    if (orphans.length > 0) {
      logger.warn("Purged orphaned accounts", {
        ids: orphans.map((account) => account.id),
      });
    }
    return orphans.map((account) => account.id);
  };

  const invalidate = (): void => {
    cache.clear();
  };

  return {
    listPartitions,
    renamePartition,
    createPartition,
    setPartitionHidden,
    findOrphanedAccounts,
    purgeOrphanedAccounts,
    invalidate,
  };
};
