/**
 * Strict publication-date parsing.
 *
 * Accepted forms (all interpreted as UTC):
 *   2020
 *   2020-03            2020/03
 *   2020-03-15         2020/03/15
 *   2020-03-15T08:30   2020-03-15 08:30:05   2020-03-15T08:30:05.250Z
 *   2020-03-15T08:30:00+02:00   2020-03-15 00:00:00-0500
 *
 * A time may carry `Z` or a UTC offset (`+HH:MM`, `+HHMM`); the offset is
 * applied, so the result is the same instant in UTC. Without one the time
 * is read as UTC.
 *
 * Anything else is unparseable and yields null, as do calendar-invalid
 * dates such as 2021-02-30 and years outside the supported domain.
 * Fractional seconds are dropped.
 */

import type { FieldValue } from "./types.js";

/** Earliest and latest representable publication years. */
export const DATE_DOMAIN = { minYear: 1678, maxYear: 2261 } as const;

const DATE_PATTERN =
  /^(\d{4})(?:([-/])(\d{1,2})(?:\2(\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:\.\d{1,9})?)?(Z|[+-]\d{2}:?\d{2})?)?)?)?$/;

const OFFSET_PATTERN = /^([+-])(\d{2}):?(\d{2})$/;

/**
 * Offset east of UTC in minutes, or null when out of range.
 */
function offsetMinutes(designator: string | undefined): number | null {
  if (designator === undefined || designator === "Z") return 0;
  const match = OFFSET_PATTERN.exec(designator);
  if (!match) return null;
  const hours = toInt(match[2], 0);
  const minutes = toInt(match[3], 0);
  if (hours > 23 || minutes > 59) return null;
  return (match[1] === "-" ? -1 : 1) * (hours * 60 + minutes);
}

function inDomain(year: number): boolean {
  return year >= DATE_DOMAIN.minYear && year <= DATE_DOMAIN.maxYear;
}

function toInt(part: string | undefined, fallback: number): number {
  return part === undefined ? fallback : parseInt(part, 10);
}

function parseDateString(text: string): Date | null {
  const match = DATE_PATTERN.exec(text.trim());
  if (!match) return null;

  const year = toInt(match[1], 0);
  const month = toInt(match[3], 1);
  const day = toInt(match[4], 1);
  const hour = toInt(match[5], 0);
  const minute = toInt(match[6], 0);
  const second = toInt(match[7], 0);

  if (!inDomain(year)) return null;
  if (month < 1 || month > 12) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  // Date.UTC rolls overflow forward (Feb 30 -> Mar 2); reject instead
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }

  const offset = offsetMinutes(match[8]);
  if (offset === null) return null;
  if (offset === 0) return date;

  const shifted = new Date(date.getTime() - offset * 60 * 1000);
  return inDomain(shifted.getUTCFullYear()) ? shifted : null;
}

/**
 * Coerce a raw cell to a Date.
 *
 * Missing and unparseable values both return null; this never throws.
 * A Date input is copied, so the result never aliases the caller's object.
 */
export function parseDate(value: FieldValue | undefined): Date | null {
  if (value === null || value === undefined) return null;

  if (value instanceof Date) {
    const time = value.getTime();
    if (Number.isNaN(time) || !inDomain(value.getUTCFullYear())) return null;
    return new Date(time);
  }

  if (typeof value === "number") {
    // A bare year read from CSV arrives as a number
    return Number.isInteger(value) ? parseDateString(String(value)) : null;
  }

  return parseDateString(value);
}

/**
 * UTC year of a parseable value, or null.
 */
export function yearOf(value: FieldValue | undefined): number | null {
  const date = parseDate(value);
  return date === null ? null : date.getUTCFullYear();
}
