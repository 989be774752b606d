import { diffProfile, resolveBalance } from "./resolve";

const at = (value: string): Date => new Date(value);

describe("resolveBalance", () => {
  const older = at("2025-03-01T10:00:00Z");
  const newer = at("2025-03-01T11:00:00Z");

  it("should skip equal balances whatever the policy", () => {
    const sides = { sheetBalance: 5, ledgerBalance: 5, sheetTimestamp: newer, ledgerTimestamp: older };

    expect(resolveBalance(sides, { policy: "newestWins" })).toEqual({ winner: "none", reason: "equal" });
    expect(resolveBalance(sides, { policy: "sheetWins" })).toEqual({ winner: "none", reason: "equal" });
  });

  it("should let the newer sheet win", () => {
    expect(
      resolveBalance(
        { sheetBalance: 30, ledgerBalance: 20, sheetTimestamp: newer, ledgerTimestamp: older },
        { policy: "newestWins" },
      ),
    ).toEqual({ winner: "sheet", reason: "sheet_newer" });
  });

  it("should let the newer ledger win", () => {
    expect(
      resolveBalance(
        { sheetBalance: 30, ledgerBalance: 20, sheetTimestamp: older, ledgerTimestamp: newer },
        { policy: "newestWins" },
      ),
    ).toEqual({ winner: "ledger", reason: "ledger_newer" });
  });

  it("should give ties to the ledger", () => {
    expect(
      resolveBalance(
        { sheetBalance: 30, ledgerBalance: 20, sheetTimestamp: older, ledgerTimestamp: older },
        { policy: "newestWins" },
      ),
    ).toEqual({ winner: "ledger", reason: "timestamps_tied" });
  });

  it("should treat timestamps within the skew tolerance as tied", () => {
    const sides = {
      sheetBalance: 30,
      ledgerBalance: 20,
      sheetTimestamp: at("2025-03-01T10:00:01.500Z"),
      ledgerTimestamp: at("2025-03-01T10:00:00Z"),
    };

    expect(resolveBalance(sides, { policy: "newestWins", clockSkewToleranceMs: 2000 })).toEqual({
      winner: "ledger",
      reason: "timestamps_tied",
    });
    expect(resolveBalance(sides, { policy: "newestWins" }).winner).toBe("sheet");
  });

  it("should let the only timestamped side win", () => {
    expect(
      resolveBalance(
        { sheetBalance: 30, ledgerBalance: 20, sheetTimestamp: older, ledgerTimestamp: null },
        { policy: "newestWins" },
      ),
    ).toEqual({ winner: "sheet", reason: "only_sheet_timestamp" });
    expect(
      resolveBalance(
        { sheetBalance: 30, ledgerBalance: 20, sheetTimestamp: null, ledgerTimestamp: older },
        { policy: "newestWins" },
      ),
    ).toEqual({ winner: "ledger", reason: "only_ledger_timestamp" });
  });

  it("should fall back to the ledger without timestamps", () => {
    expect(
      resolveBalance(
        { sheetBalance: 30, ledgerBalance: 20, sheetTimestamp: null, ledgerTimestamp: null },
        { policy: "newestWins" },
      ),
    ).toEqual({ winner: "ledger", reason: "no_timestamps" });
  });

  it("should obey forced policies regardless of timestamps", () => {
    const sides = { sheetBalance: 30, ledgerBalance: 20, sheetTimestamp: older, ledgerTimestamp: newer };

    expect(resolveBalance(sides, { policy: "sheetWins" })).toEqual({ winner: "sheet", reason: "forced" });
    expect(resolveBalance(sides, { policy: "ledgerWins" })).toEqual({ winner: "ledger", reason: "forced" });
  });
});

describe("diffProfile", () => {
  it("should return only fields the sheet changes", () => {
    expect(
      diffProfile(
        { fullName: "Ann Lee", phone: "+100", username: "ann" },
        { fullName: "Ann", phone: "+100", username: "ann" },
      ),
    ).toEqual({ fullName: "Ann Lee" });
  });

  it("should never erase a ledger value with a blank cell", () => {
    expect(
      diffProfile(
        { fullName: " ", phone: "", username: "ann2" },
        { fullName: "Ann", phone: "+100", username: "ann" },
      ),
    ).toEqual({ username: "ann2" });
  });
});
