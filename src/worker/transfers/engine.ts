/**
 * Transfer engine: point transfers and admin adjustments for the front end.
 *
 * Results are structured; ledger rule violations come back as
 * `{ success: false, error }` rather than exceptions. Infrastructure failures
 * still throw. Transfers never take the reconciliation lock.
 */

import {
  type LedgerErrorCode,
  LedgerError,
  calculateCommission,
  isLedgerError,
  validateTransferInput,
} from "@/domains/ledger";
import type { LedgerStore, SettingsRepository } from "@/lib/db/ports";
import type { Logger } from "@/lib/logger";

export interface TransferEngineDeps {
  ledger: LedgerStore;
  settings: SettingsRepository;
  logger: Logger;
}

export interface TransferQuote {
  amount: number;
  commission: number;
  /** amount + commission, debited from the sender */
  total: number;
}

export interface TransferRequest {
  senderId: string;
  recipientId: string;
  amount: number;
  /** Defaults to the current commission rate's quote */
  commission?: number;
}

export interface AdjustRequest {
  actorId: string;
  accountId: string;
  amount: number;
  reason?: string;
}

export interface OperationFailure {
  success: false;
  error: { code: LedgerErrorCode; message: string };
}

export type TransferResult =
  | {
      success: true;
      senderBalance: number;
      recipientBalance: number;
      amount: number;
      commission: number;
    }
  | OperationFailure;

export type AdjustResult = { success: true; newBalance: number } | OperationFailure;

export interface TransferEngine {
  quote: (amount: number) => Promise<TransferQuote>;
  transfer: (request: TransferRequest) => Promise<TransferResult>;
  addPoints: (request: AdjustRequest) => Promise<AdjustResult>;
  subtractPoints: (request: AdjustRequest) => Promise<AdjustResult>;
}

const failure = (error: LedgerError): OperationFailure => ({
  success: false,
  error: { code: error.code, message: error.message },
});

const requirePositiveInteger = (amount: number): void => {
  if (!Number.isInteger(amount) || amount <= 0) {
    throw new LedgerError(`Amount must be a positive integer, got ${amount}`, "INVALID_AMOUNT");
  }
};

export const createTransferEngine = (deps: TransferEngineDeps): TransferEngine => {
  const { ledger, settings } = deps;
  const logger = deps.logger.child({ component: "transfers" });

  const quote = async (amount: number): Promise<TransferQuote> => {
    requirePositiveInteger(amount);
    const { commissionRate } = await settings.get();
    const commission = calculateCommission(amount, commissionRate);
    return { amount, commission, total: amount + commission };
  };

  const transfer = async (request: TransferRequest): Promise<TransferResult> => {
    const { senderId, recipientId, amount } = request;
    try {
      const commission = request.commission ?? (await quote(amount)).commission;
      validateTransferInput(senderId, recipientId, amount, commission);

      const balances = await ledger.transferPoints(senderId, recipientId, amount, commission);
      await ledger.appendLogEntry({
        type: "transfer",
        source: "bot",
        senderId,
        recipientId,
        amount,
        commission,
      });
      logger.info("Transfer completed", { senderId, recipientId, amount, commission });
      return { success: true, ...balances, amount, commission };
    } catch (error) {
      if (isLedgerError(error)) {
        logger.warn("Transfer rejected", { senderId, recipientId, amount, code: error.code });
        return failure(error);
      }
      throw error;
    }
  };

  const adjust = async (request: AdjustRequest, direction: "add" | "subtract"): Promise<AdjustResult> => {
    const { actorId, accountId, amount, reason } = request;
    try {
      requirePositiveInteger(amount);
      const delta = direction === "add" ? amount : -amount;
      const newBalance = await ledger.adjustBalance(accountId, delta);
      await ledger.appendLogEntry({
        type: direction,
        source: "bot",
        actorId,
        ...(direction === "add" ? { recipientId: accountId } : { senderId: accountId }),
        amount,
        oldBalance: newBalance - delta,
        newBalance,
        reason: reason ?? null,
      });
      logger.info("Balance adjusted", { actorId, accountId, delta, newBalance });
      return { success: true, newBalance };
    } catch (error) {
      if (isLedgerError(error)) {
        logger.warn("Balance adjustment rejected", { actorId, accountId, amount, code: error.code });
        return failure(error);
      }
      throw error;
    }
  };

  return {
    quote,
    transfer,
    addPoints: (request) => adjust(request, "add"),
    subtractPoints: (request) => adjust(request, "subtract"),
  };
};
