export { createDatabase, type Database, type DatabaseInstance } from "./client";
export { type ConflictRetryOptions, DEFAULT_CONFLICT_ATTEMPTS, withConflictRetry } from "./conflict-retry";
export type { GroupRepository, LedgerStore, SettingsRepository, UpdateAccountOptions } from "./ports";
export {
  createMemoryGroupRepository,
  createMemoryLedgerStore,
  createMemorySettingsRepository,
  type MemoryLedgerStoreOptions,
} from "./adapters/memory";
export {
  createPostgresGroupRepository,
  createPostgresLedgerStore,
  createPostgresSettingsRepository,
} from "./adapters/postgres";
