export {
  createTransferEngine,
  type AdjustRequest,
  type AdjustResult,
  type OperationFailure,
  type TransferEngine,
  type TransferEngineDeps,
  type TransferQuote,
  type TransferRequest,
  type TransferResult,
} from "./engine";
