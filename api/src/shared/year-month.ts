import { InvalidArgumentError } from "./errors";

const YEAR_MONTH_PATTERN = /^(\d{4})-(\d{2})$/;

export class YearMonth {
  readonly year: number;
  readonly month: number;

  private constructor(year: number, month: number) {
    this.year = year;
    this.month = month;
  }

  /**
   * @param month 1-based, January is 1
   */
  public static of(year: number, month: number): YearMonth {
    if (!Number.isInteger(year)) {
      throw new InvalidArgumentError("year", `Invalid year: ${year}`);
    }
    if (!Number.isInteger(month) || month < 1 || month > 12) {
      throw new InvalidArgumentError("month", `Invalid month: ${month}`);
    }
    return new YearMonth(year, month);
  }

  /**
   * Parses `YYYY-MM`.
   */
  public static parse(value: string): YearMonth {
    const match = YEAR_MONTH_PATTERN.exec(value);
    if (!match) {
      throw new InvalidArgumentError(
        "yearMonth",
        `Invalid year-month "${value}", expected YYYY-MM`
      );
    }
    return YearMonth.of(Number(match[1]), Number(match[2]));
  }

  public equals(other: YearMonth): boolean {
    return this.year === other.year && this.month === other.month;
  }

  public toString(): string {
    return `${String(this.year).padStart(4, "0")}-${String(this.month).padStart(2, "0")}`;
  }
}
