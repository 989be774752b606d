export type { GroupRepository } from "./group-repository";
export type { LedgerStore, UpdateAccountOptions } from "./ledger-store";
export type { SettingsRepository } from "./settings-repository";
