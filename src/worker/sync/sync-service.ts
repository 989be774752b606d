/**
 * Trigger surface for reconciliation: manual passes, the background loop
 * and the sync settings that drive it.
 *
 * Every pass, manual or scheduled, runs through one serial queue, so at most
 * one reconciliation touches the sheet at a time.
 */

import type { SpreadsheetAdapter } from "@/adapters/types";
import { groupNotFound } from "@/domains/ledger";
import { type SyncStatistics, parseSettingsPatch } from "@/domains/settings";
import { type RosterComparison, type SyncMode, compareRosters } from "@/domains/sync";
import type { LedgerStore, SettingsRepository } from "@/lib/db/ports";
import { type Logger, toError } from "@/lib/logger";

import type { GroupRegistry } from "../group-registry";
import { type SerialQueue, createSerialQueue } from "../queue";
import { type ReconcileResult, type ReconcileStats, addStats, emptyStats, runReconcile } from "../reconciler";
import { type Scheduler, type TaskHandle, createScheduler } from "../scheduler";

export type PartitionMode = "single" | "groups";

export interface SyncServiceDeps {
  ledger: LedgerStore;
  spreadsheet: SpreadsheetAdapter;
  settings: SettingsRepository;
  registry: GroupRegistry;
  logger: Logger;
  partitionMode: PartitionMode;
  /** Tab reconciled in single mode */
  legacySheetName: string;
  timeZone: string;
  clockSkewToleranceMs?: number;
  queue?: SerialQueue<SyncRunResult>;
  scheduler?: Scheduler;
}

export interface PartitionFailure {
  partition: string;
  error: string;
}

export interface SyncRunResult {
  partitions: ReconcileResult[];
  failures: PartitionFailure[];
  /** Totals across every reconciled partition */
  stats: ReconcileStats;
  startedAt: Date;
  finishedAt: Date;
}

export interface SyncStatus {
  enabled: boolean;
  /** Background loop state */
  running: boolean;
  /** A pass is executing right now */
  passInFlight: boolean;
  /** Seconds */
  interval: number;
  stats: SyncStatistics;
  lastSyncAt: string | null;
}

export interface PartitionComparison extends RosterComparison {
  sheetName: string;
  groupId: string | null;
}

export interface SyncService {
  /**
   * Reconcile one partition, or every active partition when `partitionId` is
   * null. Identical triggers still waiting in the queue share one pass.
   */
  forceReconcile: (partitionId?: string | null, mode?: SyncMode) => Promise<SyncRunResult>;
  /**
   * Read-only report of where the sheet and the ledger disagree. Does not
   * take the reconciliation lock.
   */
  compare: (partitionId?: string | null) => Promise<PartitionComparison[]>;
  setSyncEnabled: (enabled: boolean) => Promise<void>;
  setSyncInterval: (seconds: number) => Promise<void>;
  getSyncStatus: () => Promise<SyncStatus>;
  start: () => Promise<void>;
  /** Cancels the loop and waits for it to exit, including its pass */
  stop: () => Promise<void>;
  /**
   * Cancels every queued or running pass and resolves once the one in
   * flight has returned.
   */
  drain: () => Promise<void>;
}

interface SheetTarget {
  sheetName: string;
  groupId: string | null;
}

const LOOP_TASK_ID = "sync-loop";

export const createSyncService = (deps: SyncServiceDeps): SyncService => {
  const { ledger, spreadsheet, settings, registry, partitionMode, legacySheetName, timeZone } = deps;
  const logger = deps.logger.child({ component: "sync" });
  const queue = deps.queue ?? createSerialQueue<SyncRunResult>();
  const scheduler = deps.scheduler ?? createScheduler({ logger });
  const reconcileDeps = {
    ledger,
    spreadsheet,
    logger,
    timeZone,
    ...(deps.clockSkewToleranceMs !== undefined && { clockSkewToleranceMs: deps.clockSkewToleranceMs }),
  };

  let loop: TaskHandle | null = null;
  let intervalSeconds: number | null = null;

  const resolveTargets = async (partitionId: string | null): Promise<SheetTarget[]> => {
    if (partitionMode === "single") {
      return [{ sheetName: legacySheetName, groupId: null }];
    }
    const partitions = await registry.listPartitions();
    const targets = partitions.map((group) => ({ sheetName: group.id, groupId: group.id }));
    return partitionId === null ? targets : targets.filter((target) => target.groupId === partitionId);
  };

  const recordOutcome = async (failures: PartitionFailure[], finishedAt: Date): Promise<void> => {
    try {
      const { syncStatistics } = await settings.get();
      const [failure] = failures;
      await settings.update(
        failure
          ? {
              syncStatistics: {
                totalSyncs: syncStatistics.totalSyncs + 1,
                failedSyncs: syncStatistics.failedSyncs + 1,
                lastError: `${failure.partition}: ${failure.error}`,
              },
            }
          : {
              syncStatistics: {
                totalSyncs: syncStatistics.totalSyncs + 1,
                successfulSyncs: syncStatistics.successfulSyncs + 1,
              },
              lastSyncAt: finishedAt.toISOString(),
            },
      );
    } catch (error) {
      logger.error("Failed to record sync statistics", toError(error));
    }
  };

  const runPass = async (
    partitionId: string | null,
    mode: SyncMode,
    signal: AbortSignal,
  ): Promise<SyncRunResult> => {
    const startedAt = new Date();
    const partitions: ReconcileResult[] = [];
    const failures: PartitionFailure[] = [];

    let targets: SheetTarget[];
    try {
      targets = await resolveTargets(partitionId);
    } catch (error) {
      const failure = { partition: partitionId ?? "*", error: toError(error).message };
      await recordOutcome([failure], new Date());
      throw error;
    }

    for (const target of targets) {
      signal.throwIfAborted();
      try {
        partitions.push(await runReconcile(reconcileDeps, { ...target, mode, signal }));
      } catch (error) {
        if (signal.aborted) {
          throw error;
        }
        logger.error("Partition reconciliation failed", toError(error), {
          sheetName: target.sheetName,
        });
        failures.push({ partition: target.sheetName, error: toError(error).message });
      }
    }

    const finishedAt = new Date();
    const stats = partitions.reduce((total, result) => addStats(total, result.stats), emptyStats());
    await recordOutcome(failures, finishedAt);

    logger.info("Sync pass complete", {
      mode,
      partitions: partitions.length,
      failures: failures.length,
      ...stats,
    });
    return { partitions, failures, stats, startedAt, finishedAt };
  };

  const enqueuePass = (
    partitionId: string | null,
    mode: SyncMode,
    signal?: AbortSignal,
  ): Promise<SyncRunResult> => {
    const handle = queue.enqueue(
      (jobSignal) => runPass(partitionId, mode, jobSignal),
      `reconcile:${partitionId ?? "*"}:${mode}`,
    );
    if (handle.coalesced) {
      logger.debug("Joined pending sync pass", { jobId: handle.id });
    }
    if (signal) {
      const onAbort = (): void => {
        handle.cancel();
      };
      signal.addEventListener("abort", onAbort, { once: true });
      const detach = (): void => {
        signal.removeEventListener("abort", onAbort);
      };
      void handle.promise.then(detach, detach);
    }
    return handle.promise;
  };

  const requirePartition = async (partitionId: string | null): Promise<void> => {
    if (partitionMode === "single" || partitionId === null) {
      return;
    }
    const partitions = await registry.listPartitions();
    if (!partitions.some((group) => group.id === partitionId)) {
      throw groupNotFound(partitionId);
    }
  };

  const forceReconcile = async (
    partitionId: string | null = null,
    mode: SyncMode = "bidirectional",
  ): Promise<SyncRunResult> => {
    if (partitionMode === "single") {
      return enqueuePass(null, mode);
    }
    await requirePartition(partitionId);
    return enqueuePass(partitionId, mode);
  };

  const compare = async (partitionId: string | null = null): Promise<PartitionComparison[]> => {
    await requirePartition(partitionId);
    const targets = await resolveTargets(partitionMode === "single" ? null : partitionId);
    const reports: PartitionComparison[] = [];
    for (const { sheetName, groupId } of targets) {
      const [{ rows }, accounts] = await Promise.all([
        spreadsheet.readRows(sheetName),
        ledger.listAccounts(
          groupId === null
            ? { role: "student", status: "active" }
            : { role: "student", status: "active", groupId },
        ),
      ]);
      reports.push({ sheetName, groupId, ...compareRosters(rows, accounts) });
    }
    return reports;
  };

  const start = async (): Promise<void> => {
    if (loop?.getState() === "running") {
      return;
    }
    intervalSeconds = (await settings.get()).syncInterval;
    loop = scheduler.schedule({
      id: LOOP_TASK_ID,
      fn: async (signal) => {
        await enqueuePass(null, "bidirectional", signal);
      },
      getIntervalMs: () => (intervalSeconds ?? 10) * 1000,
      runImmediately: false,
    });
    logger.info("Background sync started", { intervalSeconds });
  };

  const stop = async (): Promise<void> => {
    const current = loop;
    if (!current) {
      return;
    }
    loop = null;
    current.cancel();
    await current.done;
    logger.info("Background sync stopped");
  };

  const drain = async (): Promise<void> => {
    queue.cancelAll();
    await queue.waitForIdle();
  };

  const setSyncEnabled = async (enabled: boolean): Promise<void> => {
    await settings.update({ syncEnabled: enabled });
    if (enabled) {
      await start();
    } else {
      await stop();
    }
  };

  const setSyncInterval = async (seconds: number): Promise<void> => {
    const patch = parseSettingsPatch({ syncInterval: seconds });
    await settings.update(patch);
    intervalSeconds = seconds;
    logger.info("Sync interval changed", { seconds });
  };

  const getSyncStatus = async (): Promise<SyncStatus> => {
    const current = await settings.get();
    return {
      enabled: current.syncEnabled,
      running: loop?.getState() === "running",
      passInFlight: queue.isBusy(),
      interval: current.syncInterval,
      stats: current.syncStatistics,
      lastSyncAt: current.lastSyncAt,
    };
  };

  return {
    forceReconcile,
    compare,
    setSyncEnabled,
    setSyncInterval,
    getSyncStatus,
    start,
    stop,
    drain,
  };
};
