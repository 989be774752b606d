import { LedgerError, accountNotFound } from "./errors";
import type { Account } from "./types";

/**
 * Input checks that need no stored state: positive integer amount,
 * non-negative integer commission, distinct accounts.
 */
export const validateTransferInput = (
  senderId: string,
  recipientId: string,
  amount: number,
  commission: number,
): void => {
  if (!Number.isInteger(amount) || amount <= 0) {
    throw new LedgerError(`Transfer amount must be a positive integer, got ${amount}`, "INVALID_AMOUNT");
  }
  if (!Number.isInteger(commission) || commission < 0) {
    throw new LedgerError(
      `Commission must be a non-negative integer, got ${commission}`,
      "INVALID_AMOUNT",
    );
  }
  if (senderId === recipientId) {
    throw new LedgerError("Cannot transfer points to the same account", "INVALID_TRANSFER", senderId);
  }
};

export const validateDelta = (delta: number): void => {
  if (!Number.isInteger(delta)) {
    throw new LedgerError(`Balance change must be an integer, got ${delta}`, "INVALID_AMOUNT");
  }
};

type TransferParty = Pick<Account, "id" | "status" | "balance">;

/**
 * Checks both parties as read inside the transfer's transaction and returns
 * the balances to write.
 */
export const applyTransfer = (
  senderId: string,
  sender: TransferParty | undefined,
  recipientId: string,
  recipient: TransferParty | undefined,
  amount: number,
  commission: number,
): { senderBalance: number; recipientBalance: number } => {
  if (!sender) {
    throw accountNotFound(senderId);
  }
  if (!recipient) {
    throw accountNotFound(recipientId);
  }
  for (const party of [sender, recipient]) {
    if (party.status !== "active") {
      throw new LedgerError(
        `Account ${party.id} is not active (${party.status})`,
        "INACTIVE_ACCOUNT",
        party.id,
      );
    }
  }
  const total = amount + commission;
  if (sender.balance < total) {
    throw new LedgerError(
      `Insufficient balance: ${sender.balance} available, ${total} required`,
      "INSUFFICIENT_BALANCE",
      sender.id,
    );
  }
  return {
    senderBalance: sender.balance - total,
    recipientBalance: recipient.balance + amount,
  };
};

/**
 * `floor(amount × rate)`, tolerant of binary float error (100 × 0.29 is 29,
 * not 28).
 */
export const calculateCommission = (amount: number, rate: number): number =>
  Math.max(0, Math.floor(amount * rate + 1e-9));
