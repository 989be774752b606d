/**
 * Account lifecycle state machine.
 *
 * Registration creates a `pending` account; every later status change goes
 * through {@link transitionAccount}.
 */

import type { TransitionResult } from "./result";
import type { Account, AccountStatus } from "./types";

export type AccountEvent =
  | "approve"
  | "reject"
  | "remove"
  | "requestRestore"
  | "approveRestore"
  | "rejectRestore";

export const ACCOUNT_TRANSITIONS: Record<AccountEvent, { from: AccountStatus; to: AccountStatus }> = {
  approve: { from: "pending", to: "active" },
  reject: { from: "pending", to: "deleted" },
  remove: { from: "active", to: "deleted" },
  requestRestore: { from: "deleted", to: "pending_restore" },
  approveRestore: { from: "pending_restore", to: "active" },
  rejectRestore: { from: "pending_restore", to: "banned" },
};

export const INITIAL_ACCOUNT_STATUS: AccountStatus = "pending";

/**
 * Applies a lifecycle event. The returned state carries the new status only;
 * persisting it (and bumping `updatedAt`/`version`) is the store's job.
 */
export const transitionAccount = (
  account: Pick<Account, "id" | "status">,
  event: AccountEvent,
): TransitionResult<AccountStatus> => {
  const transition = ACCOUNT_TRANSITIONS[event];

  if (account.status !== transition.from) {
    return {
      ok: false,
      error: `Cannot ${event} account ${account.id} in status ${account.status}`,
    };
  }

  return { ok: true, state: transition.to, from: account.status, to: transition.to };
};
