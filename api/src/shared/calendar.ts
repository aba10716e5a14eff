import { InvalidArgumentError } from "./errors";
import { YearMonth } from "./year-month";

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const MS_PER_MINUTE = 60 * 1000;

const OFFSET_PATTERN = /^([+-])(\d{2}):(\d{2})$/;
const ISO_ZONE_SUFFIX = /(Z|[+-]\d{2}(?::?\d{2})?)$/i;

// Date.UTC maps years 0-99 onto 1900-1999, setUTCFullYear does not.
function utcMidnight(year: number, month: number, day: number): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return date;
}

/**
 * A date without time or zone. Arithmetic is done on the proleptic Gregorian
 * calendar through UTC epoch days, so it is unaffected by DST.
 */
export class CalendarDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;

  private constructor(year: number, month: number, day: number) {
    this.year = year;
    this.month = month;
    this.day = day;
  }

  public static of(year: number, month: number, day: number): CalendarDate {
    const utc = utcMidnight(year, month, day);
    if (
      utc.getUTCFullYear() !== year ||
      utc.getUTCMonth() !== month - 1 ||
      utc.getUTCDate() !== day
    ) {
      throw new InvalidArgumentError(
        "date",
        `Invalid calendar date: ${year}-${month}-${day}`
      );
    }
    return new CalendarDate(year, month, day);
  }

  private static fromEpochDay(epochDay: number): CalendarDate {
    const utc = new Date(epochDay * MS_PER_DAY);
    return new CalendarDate(
      utc.getUTCFullYear(),
      utc.getUTCMonth() + 1,
      utc.getUTCDate()
    );
  }

  get epochDay(): number {
    return utcMidnight(this.year, this.month, this.day).getTime() / MS_PER_DAY;
  }

  /**
   * 1 on January 1st, 365 or 366 on December 31st.
   */
  get dayOfYear(): number {
    const newYear = utcMidnight(this.year, 1, 1).getTime() / MS_PER_DAY;
    return this.epochDay - newYear + 1;
  }

  public minusDays(days: number): CalendarDate {
    return CalendarDate.fromEpochDay(this.epochDay - days);
  }

  public yearMonth(): YearMonth {
    return YearMonth.of(this.year, this.month);
  }
}

/**
 * Minutes east of UTC for `UTC`, `Z` and `±HH:MM` zones, undefined for
 * anything else (IANA names are resolved through Intl).
 */
function fixedOffsetOf(zone: string): number | undefined {
  if (zone === "UTC" || zone === "Z") {
    return 0;
  }
  const match = OFFSET_PATTERN.exec(zone);
  if (!match) {
    return undefined;
  }
  const hours = Number(match[2]);
  const minutes = Number(match[3]);
  if (hours > 18 || minutes > 59) {
    return undefined;
  }
  const total = hours * 60 + minutes;
  return match[1] === "-" ? -total : total;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone,
      year: "numeric",
      month: "numeric",
      day: "numeric",
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

/**
 * Accepts IANA names, `UTC`, `Z` and fixed `±HH:MM` offsets.
 */
export function isValidTimeZone(timeZone: string): boolean {
  if (fixedOffsetOf(timeZone) !== undefined) {
    return true;
  }
  try {
    formatterFor(timeZone);
    return true;
  } catch (error) {
    if (error instanceof RangeError) {
      return false;
    }
    throw error;
  }
}

/**
 * Calendar date of an instant as seen in the given zone.
 */
export function calendarDateOf(instant: Date, timeZone: string): CalendarDate {
  const offset = fixedOffsetOf(timeZone);
  if (offset !== undefined) {
    const local = new Date(instant.getTime() + offset * MS_PER_MINUTE);
    return CalendarDate.of(
      local.getUTCFullYear(),
      local.getUTCMonth() + 1,
      local.getUTCDate()
    );
  }
  const fields = { year: 0, month: 0, day: 0 };
  for (const part of formatterFor(timeZone).formatToParts(instant)) {
    if (part.type === "year" || part.type === "month" || part.type === "day") {
      fields[part.type] = Number(part.value);
    }
  }
  return CalendarDate.of(fields.year, fields.month, fields.day);
}

function normalizeOffset(suffix: string): string {
  if (suffix.toUpperCase() === "Z") {
    return "UTC";
  }
  const sign = suffix[0];
  const digits = suffix.slice(1).replace(":", "");
  return `${sign}${digits.slice(0, 2)}:${digits.slice(2, 4) || "00"}`;
}

export class ZonedDateTime {
  readonly instant: Date;
  readonly timeZone: string;

  private constructor(instant: Date, timeZone: string) {
    this.instant = instant;
    this.timeZone = timeZone;
  }

  public static of(instant: Date, timeZone: string): ZonedDateTime {
    if (Number.isNaN(instant.getTime())) {
      throw new InvalidArgumentError("instant", "Invalid instant");
    }
    if (!isValidTimeZone(timeZone)) {
      throw new InvalidArgumentError("timeZone", `Invalid time zone: ${timeZone}`);
    }
    return new ZonedDateTime(new Date(instant.getTime()), timeZone);
  }

  /**
   * Parses an ISO 8601 date-time with a `Z` or `±HH[:MM]` suffix and keeps
   * that offset as the zone.
   */
  public static parse(value: string): ZonedDateTime {
    const match = ISO_ZONE_SUFFIX.exec(value);
    if (!match) {
      throw new InvalidArgumentError(
        "dateTime",
        `Expected a date-time with an offset, got "${value}"`
      );
    }
    const zone = normalizeOffset(match[1]);
    const local = value.slice(0, match.index);
    const instant = new Date(`${local}${zone === "UTC" ? "Z" : zone}`);
    return ZonedDateTime.of(instant, zone);
  }

  public toCalendarDate(): CalendarDate {
    return calendarDateOf(this.instant, this.timeZone);
  }

  public getTime(): number {
    return this.instant.getTime();
  }

  public toISOString(): string {
    return this.instant.toISOString();
  }
}
