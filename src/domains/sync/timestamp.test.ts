import {
  formatSheetTimestamp,
  isBlankTimestamp,
  isValidTimeZone,
  parseSheetTimestamp,
  zoneOffsetMs,
} from "./timestamp";

const iso = (value: string | null | undefined, timeZone = "UTC"): string | null =>
  parseSheetTimestamp(value, timeZone)?.toISOString() ?? null;

describe("parseSheetTimestamp", () => {
  it.each([
    ["2025-03-01 10:00:00", "2025-03-01T10:00:00.000Z"],
    ["2025-03-01 10:00:00.123456", "2025-03-01T10:00:00.123Z"],
    ["2025-03-01 10:00", "2025-03-01T10:00:00.000Z"],
    ["2025-03-01", "2025-03-01T00:00:00.000Z"],
    ["01/03/2025 10:00:00", "2025-03-01T10:00:00.000Z"],
    ["01/03/2025", "2025-03-01T00:00:00.000Z"],
    ["01.03.2025 10:00", "2025-03-01T10:00:00.000Z"],
    ["1.3.2025 10:00:30", "2025-03-01T10:00:30.000Z"],
    ["2025-03-01T12:00:00+02:00", "2025-03-01T10:00:00.000Z"],
    ["2025-03-01T10:00:00Z", "2025-03-01T10:00:00.000Z"],
    ["  2025-03-01 10:00:00  ", "2025-03-01T10:00:00.000Z"],
  ])("should read %s", (raw, expected) => {
    expect(iso(raw)).toBe(expected);
  });

  it("should interpret local times in the sheet zone", () => {
    expect(iso("2025-03-01 15:00:00", "Asia/Tashkent")).toBe("2025-03-01T10:00:00.000Z");
    expect(iso("2025-01-15 12:00:00", "Europe/Berlin")).toBe("2025-01-15T11:00:00.000Z");
    expect(iso("2025-07-01 12:00:00", "Europe/Berlin")).toBe("2025-07-01T10:00:00.000Z");
  });

  it("should ignore the zone when the value carries an offset", () => {
    expect(iso("2025-03-01T10:00:00Z", "Asia/Tashkent")).toBe("2025-03-01T10:00:00.000Z");
  });

  it.each(["yesterday", "2025-13-01", "31/02/2025", "2025-03-01 25:00:00", "12345"])(
    "should return null for %s",
    (raw) => {
      expect(iso(raw)).toBeNull();
    },
  );

  it("should return null for blank cells", () => {
    expect(iso("")).toBeNull();
    expect(iso("   ")).toBeNull();
    expect(iso(undefined)).toBeNull();
    expect(isBlankTimestamp(" ")).toBe(true);
    expect(isBlankTimestamp("2025-03-01")).toBe(false);
  });

  it("should move times inside a DST gap forward", () => {
    const parsed = parseSheetTimestamp("2025-03-30 02:30:00", "Europe/Berlin");

    expect(parsed?.toISOString()).toBe("2025-03-30T01:30:00.000Z");
  });
});

describe("formatSheetTimestamp", () => {
  it("should write the canonical layout in the sheet zone", () => {
    const instant = new Date("2025-03-01T10:00:00.500Z");

    expect(formatSheetTimestamp(instant, "UTC")).toBe("2025-03-01 10:00:00");
    expect(formatSheetTimestamp(instant, "Asia/Tashkent")).toBe("2025-03-01 15:00:00");
  });

  it("should read back what it writes", () => {
    const written = formatSheetTimestamp(new Date("2025-11-09T23:59:59Z"), "Europe/Berlin");

    expect(written).toBe("2025-11-10 00:59:59");
    expect(iso(written, "Europe/Berlin")).toBe("2025-11-09T23:59:59.000Z");
  });
});

describe("zoneOffsetMs", () => {
  it("should follow daylight saving", () => {
    expect(zoneOffsetMs(new Date("2025-07-01T00:00:00Z"), "Europe/Berlin")).toBe(7_200_000);
    expect(zoneOffsetMs(new Date("2025-01-01T00:00:00Z"), "Europe/Berlin")).toBe(3_600_000);
    expect(zoneOffsetMs(new Date("2025-01-01T00:00:00Z"), "UTC")).toBe(0);
  });
});

describe("isValidTimeZone", () => {
  it("should accept IANA names and reject others", () => {
    expect(isValidTimeZone("Asia/Tashkent")).toBe(true);
    expect(isValidTimeZone("Mars/Olympus")).toBe(false);
  });
});
