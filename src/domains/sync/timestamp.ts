/**
 * Spreadsheet timestamp handling.
 *
 * Cells hold local wall-clock times in the sheet's IANA time zone, written by
 * people as well as by this service, so reading accepts several layouts:
 *
 * - `YYYY-MM-DD HH:MM:SS[.ffffff]`, `YYYY-MM-DD HH:MM`, `YYYY-MM-DD`
 * - `DD/MM/YYYY[ HH:MM[:SS]]`
 * - `DD.MM.YYYY[ HH:MM[:SS]]`
 * - ISO-8601 with an explicit offset (`2025-03-01T10:00:00Z`, `...+02:00`)
 *
 * Everything is normalised to a UTC `Date`. Writing always produces
 * `YYYY-MM-DD HH:MM:SS` in the sheet's zone.
 */

interface WallClock {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
}

const ISO_YMD = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?$/;
const SLASH_DMY = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?: (\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;
const DOT_DMY = /^(\d{1,2})\.(\d{1,2})\.(\d{4})(?: (\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;
const ISO_WITH_OFFSET =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})$/i;

const formatters = new Map<string, Intl.DateTimeFormat>();

const getFormatter = (timeZone: string): Intl.DateTimeFormat => {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
};

export const isValidTimeZone = (timeZone: string): boolean => {
  try {
    getFormatter(timeZone);
    return true;
  } catch (error) {
    if (error instanceof RangeError) {
      return false;
    }
    throw error;
  }
};

const toWallClock = (date: Date, timeZone: string): WallClock => {
  const fields: Record<string, number> = {};
  for (const part of getFormatter(timeZone).formatToParts(date)) {
    if (part.type !== "literal") {
      fields[part.type] = Number(part.value);
    }
  }
  return {
    year: fields.year ?? 1970,
    month: fields.month ?? 1,
    day: fields.day ?? 1,
    hour: fields.hour ?? 0,
    minute: fields.minute ?? 0,
    second: fields.second ?? 0,
    millisecond: date.getUTCMilliseconds(),
  };
};

const wallClockAsUtc = (clock: WallClock): number =>
  Date.UTC(
    clock.year,
    clock.month - 1,
    clock.day,
    clock.hour,
    clock.minute,
    clock.second,
    clock.millisecond,
  );

/**
 * Offset of `timeZone` from UTC at the given instant, in milliseconds
 * (positive east of Greenwich).
 */
export const zoneOffsetMs = (date: Date, timeZone: string): number =>
  wallClockAsUtc(toWallClock(date, timeZone)) - date.getTime();

/**
 * Converts a wall-clock time in `timeZone` to the UTC instant. Times that
 * fall in a DST gap resolve forward by the gap length.
 */
const fromWallClock = (clock: WallClock, timeZone: string): Date => {
  const guess = wallClockAsUtc(clock);
  const firstOffset = zoneOffsetMs(new Date(guess), timeZone);
  const candidate = guess - firstOffset;
  const secondOffset = zoneOffsetMs(new Date(candidate), timeZone);
  return new Date(secondOffset === firstOffset ? candidate : guess - secondOffset);
};

const isValidWallClock = (clock: WallClock): boolean => {
  if (clock.month < 1 || clock.month > 12 || clock.day < 1) {
    return false;
  }
  const daysInMonth = new Date(Date.UTC(clock.year, clock.month, 0)).getUTCDate();
  return (
    clock.day <= daysInMonth &&
    clock.hour <= 23 &&
    clock.minute <= 59 &&
    clock.second <= 59
  );
};

const toNumber = (value: string | undefined): number => (value ? Number(value) : 0);

const fractionToMs = (fraction: string | undefined): number =>
  fraction ? Number(fraction.slice(0, 3).padEnd(3, "0")) : 0;

const matchWallClock = (value: string): WallClock | null => {
  const iso = ISO_YMD.exec(value);
  if (iso) {
    return {
      year: toNumber(iso[1]),
      month: toNumber(iso[2]),
      day: toNumber(iso[3]),
      hour: toNumber(iso[4]),
      minute: toNumber(iso[5]),
      second: toNumber(iso[6]),
      millisecond: fractionToMs(iso[7]),
    };
  }

  const dmy = SLASH_DMY.exec(value) ?? DOT_DMY.exec(value);
  if (dmy) {
    return {
      year: toNumber(dmy[3]),
      month: toNumber(dmy[2]),
      day: toNumber(dmy[1]),
      hour: toNumber(dmy[4]),
      minute: toNumber(dmy[5]),
      second: toNumber(dmy[6]),
      millisecond: 0,
    };
  }

  return null;
};

export const isBlankTimestamp = (raw: string | null | undefined): boolean =>
  raw === null || raw === undefined || raw.trim() === "";

/**
 * Parses a cell value. Returns null for blank or unrecognised input.
 */
export const parseSheetTimestamp = (raw: string | null | undefined, timeZone: string): Date | null => {
  if (raw === null || raw === undefined) {
    return null;
  }
  const value = raw.trim();
  if (value === "") {
    return null;
  }

  if (ISO_WITH_OFFSET.test(value)) {
    const parsed = Date.parse(value);
    return Number.isNaN(parsed) ? null : new Date(parsed);
  }

  const clock = matchWallClock(value);
  if (!clock || !isValidWallClock(clock)) {
    return null;
  }
  return fromWallClock(clock, timeZone);
};

const pad = (value: number, length = 2): string => String(value).padStart(length, "0");

/**
 * Formats an instant as `YYYY-MM-DD HH:MM:SS` in `timeZone`.
 */
export const formatSheetTimestamp = (date: Date, timeZone: string): string => {
  const clock = toWallClock(date, timeZone);
  return `${pad(clock.year, 4)}-${pad(clock.month)}-${pad(clock.day)} ${pad(clock.hour)}:${pad(clock.minute)}:${pad(clock.second)}`;
};
