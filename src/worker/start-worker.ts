/**
 * Worker orchestrator: wires the spreadsheet adapter, stores and services,
 * runs the startup reconciliation and starts the background sync loop.
 */

import { createSpreadsheetAdapter, resolveSpreadsheetConfig } from "@/adapters";
import type { SpreadsheetAdapter } from "@/adapters/types";
import type { AppConfig } from "@/lib/config";
import type { GroupRepository, LedgerStore, SettingsRepository } from "@/lib/db";
import { type Logger, toError } from "@/lib/logger";

import { type AccountService, createAccountService } from "./accounts";
import { type GroupRegistry, createGroupRegistry } from "./group-registry";
import { createScheduler } from "./scheduler";
import { type SyncService, createSyncService } from "./sync";
import { type TransferEngine, createTransferEngine } from "./transfers";

export interface WorkerStores {
  ledger: LedgerStore;
  groups: GroupRepository;
  settings: SettingsRepository;
}

/**
 * Configuration for starting the worker.
 */
export interface StartWorkerConfig {
  config: AppConfig;
  stores: WorkerStores;
  logger: Logger;
  /** Built from `config.sheets` when omitted */
  spreadsheet?: SpreadsheetAdapter;
}

/**
 * Handle returned by startWorker for lifecycle management.
 */
export interface WorkerHandle {
  sync: SyncService;
  transfers: TransferEngine;
  accounts: AccountService;
  registry: GroupRegistry;
  settings: SettingsRepository;
  shutdown: () => Promise<void>;
}

/**
 * Start the worker: initial reconciliation, then the background loop when
 * sync is enabled. A failed initial pass is logged; the worker still starts.
 */
export const startWorker = async (startConfig: StartWorkerConfig): Promise<WorkerHandle> => {
  const { config, stores, logger } = startConfig;
  const { ledger, groups, settings } = stores;

  const spreadsheet =
    startConfig.spreadsheet ??
    createSpreadsheetAdapter(resolveSpreadsheetConfig(config.sheets), { logger });

  const registry = createGroupRegistry({
    groups,
    ledger,
    spreadsheet,
    logger,
    ignoredTabs: config.partitions.ignoredTabs,
    renameDetection: config.partitions.renameDetection,
    cacheTtlMs: config.partitions.cacheTtlMs,
  });
  const scheduler = createScheduler({ logger });
  const sync = createSyncService({
    ledger,
    spreadsheet,
    settings,
    registry,
    logger,
    scheduler,
    partitionMode: config.partitions.mode,
    legacySheetName: config.partitions.legacySheetName,
    timeZone: config.sheets.timeZone,
    clockSkewToleranceMs: config.sync.clockSkewToleranceMs,
  });
  const transfers = createTransferEngine({ ledger, settings, logger });
  const accounts = createAccountService({ ledger, groups, logger });

  logger.info("Running startup reconciliation", { partitionMode: config.partitions.mode });
  try {
    const result = await sync.forceReconcile(null);
    logger.info("Startup reconciliation complete", {
      partitions: result.partitions.length,
      failures: result.failures.length,
      ...result.stats,
    });
  } catch (error) {
    logger.error("Startup reconciliation failed", toError(error));
  }

  if ((await settings.get()).syncEnabled) {
    await sync.start();
  } else {
    logger.info("Background sync disabled in settings");
  }

  const shutdown = async (): Promise<void> => {
    logger.info("Worker shutting down...");
    await sync.stop();
    await sync.drain();
    scheduler.cancelAll();
    await scheduler.waitForRunning();
    logger.info("Worker shutdown complete");
  };

  return { sync, transfers, accounts, registry, settings, shutdown };
};
