import { SpreadsheetError } from "@/adapters/errors";
import { LedgerError } from "@/domains/ledger";
import { JobCancelledError } from "@/worker/queue";

import { RequestValidationError, toErrorResponse } from "./errors";

describe("toErrorResponse", () => {
  it("should answer a cancelled pass with 409", () => {
    expect(toErrorResponse(new JobCancelledError("reconcile:10A:bidirectional#3"))).toEqual({
      status: 409,
      body: {
        error: {
          code: "SYNC_CANCELLED",
          message: "Reconciliation pass was cancelled before it finished",
        },
      },
    });
  });

  it("should carry the field of a validation error", () => {
    expect(toErrorResponse(new RequestValidationError("amount: Invalid type", "amount"))).toEqual({
      status: 400,
      body: { error: { code: "INVALID_REQUEST", message: "amount: Invalid type", field: "amount" } },
    });
  });

  it("should map ledger and spreadsheet codes", () => {
    expect(toErrorResponse(new LedgerError("short", "INSUFFICIENT_BALANCE"))?.status).toBe(422);
    expect(toErrorResponse(new SpreadsheetError("slow down", "RATE_LIMITED"))).toMatchObject({
      status: 429,
      body: { error: { code: "SPREADSHEET_RATE_LIMITED" } },
    });
  });

  it("should return null for anything else", () => {
    expect(toErrorResponse(new Error("boom"))).toBeNull();
  });
});
