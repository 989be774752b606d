import { columnLetter, decodeRows, encodeRow, updatableFields } from "./normalizers";

describe("decodeRows", () => {
  it("should decode a well-formed row", () => {
    const { rows, issues } = decodeRows(
      "10A",
      [["u1", " Ann Lee ", "555-0100", "ann", "12", "2025-03-01 10:00:00"]],
      "UTC",
    );

    expect(issues).toEqual([]);
    expect(rows).toEqual([
      {
        id: "u1",
        fullName: "Ann Lee",
        phone: "555-0100",
        username: "ann",
        balance: 12,
        lastUpdated: "2025-03-01 10:00:00",
        lastUpdatedAt: new Date("2025-03-01T10:00:00.000Z"),
        rowNumber: 2,
      },
    ]);
  });

  it("should accept numeric cells and signed integers", () => {
    const { rows } = decodeRows(
      "10A",
      [
        ["u1", "Ann", "", "", 7, ""],
        ["u2", "Bob", "", "", "+5", ""],
        ["u3", "Cy", "", "", "-3", ""],
      ],
      "UTC",
    );

    expect(rows.map((row) => row.balance)).toEqual([7, 5, -3]);
  });

  it("should skip blank rows and report rows without an id", () => {
    const { rows, issues } = decodeRows("10A", [["u1", "Ann"], [], ["", "Nobody"]], "UTC");

    expect(rows.map((row) => row.id)).toEqual(["u1"]);
    expect(issues).toEqual([
      {
        code: "MISSING_ID",
        sheetName: "10A",
        rowNumber: 4,
        message: "Row 4 has no UserID",
      },
    ]);
  });

  it("should keep the first of duplicate ids", () => {
    const { rows, issues } = decodeRows(
      "10A",
      [
        ["u1", "First", "", "", "1"],
        ["u1", "Second", "", "", "2"],
      ],
      "UTC",
    );

    expect(rows).toHaveLength(1);
    expect(rows[0]?.fullName).toBe("First");
    expect(issues[0]).toMatchObject({ code: "DUPLICATE_ID", rowNumber: 3, id: "u1" });
  });

  it("should treat a malformed balance as zero and report it", () => {
    const { rows, issues } = decodeRows("10A", [["u2", "Bob", "", "", "1.5", ""]], "UTC");

    expect(rows[0]?.balance).toBe(0);
    expect(issues).toEqual([
      {
        code: "MALFORMED_BALANCE",
        sheetName: "10A",
        rowNumber: 2,
        id: "u2",
        value: "1.5",
        message: 'Points value "1.5" for u2 is not an integer; using 0',
      },
    ]);
  });

  it("should treat an empty balance as zero without an issue", () => {
    const { rows, issues } = decodeRows("10A", [["u3", "Cy", "", "", "", ""]], "UTC");

    expect(rows[0]?.balance).toBe(0);
    expect(rows[0]?.lastUpdatedAt).toBeNull();
    expect(issues).toEqual([]);
  });

  it("should report an unreadable timestamp and keep the row", () => {
    const { rows, issues } = decodeRows("10A", [["u4", "Di", "", "", "3", "someday"]], "UTC");

    expect(rows[0]).toMatchObject({ id: "u4", balance: 3, lastUpdated: "someday", lastUpdatedAt: null });
    expect(issues[0]).toMatchObject({ code: "MALFORMED_TIMESTAMP", rowNumber: 2, value: "someday" });
  });
});

describe("encodeRow", () => {
  it("should lay fields out in header order", () => {
    expect(
      encodeRow({
        id: "u1",
        fullName: "Ann",
        phone: "555-0100",
        username: "ann",
        balance: 40,
        lastUpdated: "2025-03-01 10:00:00",
      }),
    ).toEqual(["u1", "Ann", "555-0100", "ann", 40, "2025-03-01 10:00:00"]);
  });
});

describe("updatableFields", () => {
  it("should list present fields in column order", () => {
    expect(updatableFields({ lastUpdated: "x", balance: 1, phone: undefined })).toEqual([
      "balance",
      "lastUpdated",
    ]);
  });

  it("should map column indexes to letters", () => {
    expect(columnLetter(0)).toBe("A");
    expect(columnLetter(5)).toBe("F");
  });
});
