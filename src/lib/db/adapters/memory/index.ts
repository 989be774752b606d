export { createMemoryGroupRepository } from "./group-repository";
export { createMemoryLedgerStore, type MemoryLedgerStoreOptions } from "./ledger-store";
export { createMemorySettingsRepository } from "./settings-repository";
