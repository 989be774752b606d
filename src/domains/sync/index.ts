export {
  formatSheetTimestamp,
  isBlankTimestamp,
  isValidTimeZone,
  parseSheetTimestamp,
  zoneOffsetMs,
} from "./timestamp";

export type { BalancePolicy, SyncMode, SyncModeSteps } from "./modes";
export { SYNC_MODE_STEPS, syncModeSchema } from "./modes";

export type {
  BalanceResolution,
  BalanceSides,
  BalanceWinner,
  ResolutionReason,
  ResolveOptions,
} from "./resolve";
export { diffProfile, resolveBalance } from "./resolve";

export type { BalanceMismatch, RosterComparison, RosterEntry } from "./compare";
export { compareRosters } from "./compare";
