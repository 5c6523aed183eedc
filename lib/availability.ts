import type { ReservationStatus, TimeWindow } from "@/lib/types";

/** Statuses that hold a slot. Denied reservations never block anything. */
export const BLOCKING_STATUSES: readonly ReservationStatus[] = ["Pending", "Approved"];

export function blocks(status: ReservationStatus): boolean {
  return BLOCKING_STATUSES.includes(status);
}

/** Half-open overlap: back-to-back windows do not conflict. */
export function overlaps(a: TimeWindow, b: TimeWindow): boolean {
  return a.start.getTime() < b.end.getTime() && a.end.getTime() > b.start.getTime();
}

export function isValidWindow(w: TimeWindow): boolean {
  return w.end.getTime() > w.start.getTime();
}

export function effectiveDailyLimit(limit: number | null | undefined): number {
  return limit && limit > 0 ? Math.floor(limit) : 1;
}

export function isWithinLimit(overlapCount: number, dailyLimit: number | null | undefined): boolean {
  return overlapCount < effectiveDailyLimit(dailyLimit);
}

export type Booking = TimeWindow & { status: ReservationStatus };

export function countBlockingOverlaps(bookings: Iterable<Booking>, window: TimeWindow): number {
  let n = 0;
  for (const b of bookings) {
    if (blocks(b.status) && overlaps(b, window)) n++;
  }
  return n;
}
