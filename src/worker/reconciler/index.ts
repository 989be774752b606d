/**
 * Reconciler module exports.
 */

// Types
export type {
  ReconcileDeps,
  ReconcileOptions,
  ReconcileResult,
  ReconcileStats,
  RowPlan,
} from "./types";

// Defaults and helpers
export { addStats, DEFAULT_MAX_ROW_ATTEMPTS, emptyStats } from "./types";

// Functions
export { runReconcile } from "./reconcile";
export { isNoopPlan, planRow, type PlanOptions } from "./plan";
