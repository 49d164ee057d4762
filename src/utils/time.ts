/**
 * Timestamp helpers.
 *
 * The API reports UTC times without a zone designator and expects request
 * ranges in the same shape; user input on the command line may be absolute
 * or relative ("3 hours ago").
 */

import { add, isValid, parseISO, sub, type Duration } from "date-fns";

const ZONE_SUFFIX = /(Z|[+-]\d{2}:?\d{2})$/i;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/** `2021/02/10 11:42:56:000` or `2021/02/10 11:42:56` */
const SLASH_TIMESTAMP = /^(\d{4})\/(\d{2})\/(\d{2}) (\d{2}):(\d{2}):(\d{2})(?::(\d{3}))?$/;
/** `yyyy/M/d[ HH:mm[:ss]]` */
const SLASH_DATE_TIME = /^(\d{4})\/(\d{1,2})\/(\d{1,2})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

/** Matched calendar fields → Date, read as UTC regardless of the host time zone */
function utcFromFields(match: RegExpExecArray): Date | null {
  const [, year, month, day, hour = "0", minute = "0", second = "0", millis = "0"] = match;
  const pad = (v: string, width = 2) => v.padStart(width, "0");
  const d = parseISO(
    `${year}-${pad(month)}-${pad(day)}T${pad(hour)}:${pad(minute)}:${pad(second)}.${pad(millis, 3)}Z`
  );
  return isValid(d) ? d : null;
}

/** `2021-02-10T11:42:56` (or with a zone) → Date, treating zone-less values as UTC */
export function parseUtcTimestamp(value: string): Date | null {
  const dated = DATE_ONLY.test(value) ? `${value}T00:00:00` : value;
  const iso = ZONE_SUFFIX.test(dated) ? dated : `${dated}Z`;
  const d = parseISO(iso);
  return isValid(d) ? d : null;
}

/** `2021/02/10 11:42:56:000` → Date (UTC) */
export function parseSlashTimestamp(value: string): Date | null {
  const match = SLASH_TIMESTAMP.exec(value);
  return match ? utcFromFields(match) : null;
}

/** Format a Date the way the prices endpoint expects: `yyyy-MM-ddTHH:mm:ss` in UTC */
export function formatApiTimestamp(d: Date): string {
  return d.toISOString().slice(0, 19);
}

const UNITS: Record<string, keyof Duration> = {
  second: "seconds",
  minute: "minutes",
  hour: "hours",
  day: "days",
  week: "weeks",
  month: "months",
  year: "years",
};

const RELATIVE_AGO = /^(\d+)\s+([a-z]+?)s?\s+ago$/i;
const RELATIVE_IN = /^in\s+(\d+)\s+([a-z]+?)s?$/i;

/**
 * Parse a date expression from the command line.
 *
 * Accepts `now`, ISO-8601 timestamps, `yyyy/M/d[ HH:mm[:ss]]` and relative
 * phrases such as `2 hours ago` or `in 3 days`. Values without a zone are UTC.
 * Returns null when nothing matches.
 */
export function parseDateExpression(expr: string, now: Date = new Date()): Date | null {
  const text = expr.trim();
  if (text.toLowerCase() === "now") return now;

  const relative = RELATIVE_AGO.exec(text) ?? RELATIVE_IN.exec(text);
  if (relative) {
    const unit = UNITS[relative[2].toLowerCase()];
    if (!unit) return null;
    const duration: Duration = {};
    duration[unit] = Number(relative[1]);
    return RELATIVE_AGO.test(text) ? sub(now, duration) : add(now, duration);
  }

  const absolute = SLASH_DATE_TIME.exec(text);
  if (absolute) return utcFromFields(absolute);

  if (/^\d{4}-\d{2}-\d{2}/.test(text)) {
    return parseUtcTimestamp(text);
  }
  return null;
}
