import { calendarDaysBetween } from "@/lib/dates";

/** Whole calendar days (UTC dates, time of day ignored) from due date to return date. */
export function daysLate(dueAt: Date, returnedAt: Date): number {
  return Math.max(0, calendarDaysBetween(dueAt, returnedAt));
}

export function overdueFee(dueAt: Date, returnedAt: Date, ratePerDay: number): number {
  const days = daysLate(dueAt, returnedAt);
  return days > 0 ? roundMoney(ratePerDay * days) : 0;
}

function roundMoney(n: number): number {
  return Math.round(n * 100) / 100;
}
