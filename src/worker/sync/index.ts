export {
  createSyncService,
  type PartitionComparison,
  type PartitionFailure,
  type PartitionMode,
  type SyncRunResult,
  type SyncService,
  type SyncServiceDeps,
  type SyncStatus,
} from "./sync-service";
