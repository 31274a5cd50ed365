import { InvalidArgumentError } from "../errors/EntityStoreError";

const ISO_8601 =
  /^(\d{4})-(\d{2})-(\d{2})T\d{2}:\d{2}(?::\d{2}(?:\.\d{1,9})?)?(Z|[+-]\d{2}:\d{2})?$/;

export class Timestamp {
  private constructor() {}

  /**
   * Current time, pushed 1ms past `after` when the clock has not moved beyond it.
   */
  public static now(after?: Date): Date {
    const current = Date.now();
    if (after && current <= after.getTime()) {
      return new Date(after.getTime() + 1);
    }
    return new Date(current);
  }

  /**
   * Parse an ISO-8601 date-time. Values without a zone are read as UTC.
   */
  public static parse(value: unknown, field: string): Date {
    const match = typeof value === "string" ? ISO_8601.exec(value) : null;
    if (typeof value !== "string" || !match) {
      throw new InvalidArgumentError(
        `${field} must be an ISO-8601 string, got ${String(value)}`,
        { field }
      );
    }

    const [, year, month, day, zone] = match;
    const calendarDay = new Date(
      Date.UTC(Number(year), Number(month) - 1, Number(day))
    );
    // Date.UTC rolls 2026-02-30 over into March; the parts must survive intact
    if (
      calendarDay.getUTCFullYear() !== Number(year) ||
      calendarDay.getUTCMonth() !== Number(month) - 1 ||
      calendarDay.getUTCDate() !== Number(day)
    ) {
      throw new InvalidArgumentError(`${field} is not a calendar date: ${value}`, {
        field,
      });
    }

    const date = new Date(zone === undefined ? `${value}Z` : value);
    if (Number.isNaN(date.getTime())) {
      throw new InvalidArgumentError(`${field} is not a valid date: ${value}`, {
        field,
      });
    }
    return date;
  }

  public static format(date: Date): string {
    return date.toISOString();
  }
}
