import { LedgerError, writeConflict } from "@/domains/ledger";

import { withConflictRetry } from "./conflict-retry";

const noDelay = { initialDelayMs: 0, maxDelayMs: 0, multiplier: 1, jitterFactor: 0 };

describe("withConflictRetry", () => {
  it("should return the first successful result", async () => {
    const operation = vi.fn<() => Promise<number>>().mockResolvedValue(7);

    await expect(withConflictRetry(operation)).resolves.toBe(7);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("should retry conflicts until the write lands", async () => {
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(writeConflict("u1"))
      .mockRejectedValueOnce(writeConflict("u1"))
      .mockResolvedValueOnce("done");

    await expect(withConflictRetry(operation, { backoff: noDelay })).resolves.toBe("done");
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it("should surface the conflict after the attempt budget", async () => {
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(writeConflict("u1"));

    await expect(
      withConflictRetry(operation, { maxAttempts: 5, backoff: noDelay }),
    ).rejects.toMatchObject({ code: "CONCURRENT_WRITE_CONFLICT", accountId: "u1" });
    expect(operation).toHaveBeenCalledTimes(5);
  });

  it("should not retry other errors", async () => {
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValue(new LedgerError("low", "INSUFFICIENT_BALANCE", "u1"));

    await expect(withConflictRetry(operation, { backoff: noDelay })).rejects.toMatchObject({
      code: "INSUFFICIENT_BALANCE",
    });
    expect(operation).toHaveBeenCalledTimes(1);
  });
});
