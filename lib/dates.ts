import { addDays, isValid, parseISO } from "date-fns";

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const HAS_ZONE = /(Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Parses a form value (`datetime-local` or full ISO string).
 * Values without an offset are read as UTC; a bare date is UTC midnight.
 */
export function parseDateTime(raw: string | null | undefined): Date | null {
  const value = (raw ?? "").trim();
  if (!value) return null;
  const withZone = !value.includes("T") ? `${value}T00:00:00Z` : HAS_ZONE.test(value) ? value : `${value}Z`;
  const d = parseISO(withZone);
  return isValid(d) ? d : null;
}

/** Days since epoch of the UTC calendar date, time of day dropped. */
export function utcDayNumber(d: Date): number {
  return Math.floor(Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate()) / MS_PER_DAY);
}

export function calendarDaysBetween(from: Date, to: Date): number {
  return utcDayNumber(to) - utcDayNumber(from);
}

/** `YYYY-MM-DDTHH:mm` in UTC, the shape a datetime-local input takes. */
export function toDateTimeLocal(d: Date): string {
  return d.toISOString().slice(0, 16);
}

export function plusDays(d: Date, days: number): Date {
  return addDays(d, days);
}

export function formatDateTime(iso: string | null): string {
  if (!iso) return "";
  const d = parseISO(iso);
  return isValid(d) ? `${d.toISOString().slice(0, 10)} ${d.toISOString().slice(11, 16)}` : iso;
}
