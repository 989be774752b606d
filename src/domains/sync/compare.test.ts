import { compareRosters } from "./compare";

describe("compareRosters", () => {
  it("should list ids found on one side only and balances that differ", () => {
    const result = compareRosters(
      [
        { id: "s1", fullName: "Ann", balance: 10 },
        { id: "s2", fullName: "Bob", balance: 5 },
        { id: "s9", fullName: "Zed", balance: 1 },
      ],
      [
        { id: "s1", fullName: "Ann Lee", balance: 10 },
        { id: "s2", fullName: "Bob Ray", balance: 8 },
        { id: "s3", fullName: "Cy Dunn", balance: 4 },
      ],
    );

    expect(result).toEqual({
      onlyInSheet: ["s9"],
      onlyInLedger: ["s3"],
      balanceMismatches: [{ id: "s2", fullName: "Bob Ray", sheetBalance: 5, ledgerBalance: 8 }],
      matched: 1,
    });
  });

  it("should compare a repeated sheet id once", () => {
    const result = compareRosters(
      [
        { id: "s1", fullName: "Ann", balance: 10 },
        { id: "s1", fullName: "Ann", balance: 99 },
      ],
      [{ id: "s1", fullName: "Ann", balance: 10 }],
    );

    expect(result).toEqual({ onlyInSheet: [], onlyInLedger: [], balanceMismatches: [], matched: 1 });
  });
});
