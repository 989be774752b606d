import { applyTransfer, calculateCommission, validateDelta, validateTransferInput } from "./transfer-rules";

const thrownBy = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected function to throw");
};

const active = (id: string, balance: number) => ({ id, status: "active" as const, balance });

describe("validateTransferInput", () => {
  it("should accept a positive amount between distinct accounts", () => {
    expect(() => validateTransferInput("a", "b", 50, 5)).not.toThrow();
  });

  it.each([0, -5, 2.5])("should reject amount %s", (amount) => {
    expect(thrownBy(() => validateTransferInput("a", "b", amount, 0))).toMatchObject({
      code: "INVALID_AMOUNT",
    });
  });

  it("should reject a negative commission", () => {
    expect(thrownBy(() => validateTransferInput("a", "b", 10, -1))).toMatchObject({
      code: "INVALID_AMOUNT",
    });
  });

  it("should reject transfers to self", () => {
    expect(thrownBy(() => validateTransferInput("a", "a", 10, 1))).toMatchObject({
      code: "INVALID_TRANSFER",
    });
  });
});

describe("validateDelta", () => {
  it("should reject fractional deltas", () => {
    expect(thrownBy(() => validateDelta(1.5))).toMatchObject({ code: "INVALID_AMOUNT" });
    expect(() => validateDelta(-3)).not.toThrow();
  });
});

describe("applyTransfer", () => {
  it("should debit amount plus commission and credit the amount", () => {
    expect(applyTransfer("a", active("a", 100), "b", active("b", 0), 50, 5)).toEqual({
      senderBalance: 45,
      recipientBalance: 50,
    });
  });

  it("should allow spending the whole balance", () => {
    expect(applyTransfer("a", active("a", 55), "b", active("b", 1), 50, 5).senderBalance).toBe(0);
  });

  it("should refuse when amount plus commission exceeds the balance", () => {
    expect(thrownBy(() => applyTransfer("a", active("a", 40), "b", active("b", 0), 50, 5))).toMatchObject({
      code: "INSUFFICIENT_BALANCE",
      accountId: "a",
    });
  });

  it("should refuse missing and inactive accounts", () => {
    expect(thrownBy(() => applyTransfer("a", undefined, "b", active("b", 0), 1, 0))).toMatchObject({
      code: "NOT_FOUND",
      accountId: "a",
    });
    const banned = { id: "b", status: "banned" as const, balance: 0 };
    expect(thrownBy(() => applyTransfer("a", active("a", 10), "b", banned, 1, 0))).toMatchObject({
      code: "INACTIVE_ACCOUNT",
      accountId: "b",
    });
  });
});

describe("calculateCommission", () => {
  it("should floor the commission", () => {
    expect(calculateCommission(50, 0.1)).toBe(5);
    expect(calculateCommission(55, 0.1)).toBe(5);
    expect(calculateCommission(9, 0.1)).toBe(0);
  });

  it("should not lose a point to float error", () => {
    expect(calculateCommission(100, 0.29)).toBe(29);
  });

  it("should be zero at a zero rate", () => {
    expect(calculateCommission(100, 0)).toBe(0);
  });
});
