export { createPostgresGroupRepository } from "./group-repository";
export { createPostgresLedgerStore } from "./ledger-store";
export { createPostgresSettingsRepository } from "./settings-repository";
