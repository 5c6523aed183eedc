import type { Reservation, ReservationStatus, User } from "@/lib/types";

export type CalendarEvent = {
  id: string;
  title: string;
  start: string;
  end: string;
  color: string;
};

export const STATUS_COLORS: Record<ReservationStatus, string> = {
  Approved: "#28a745",
  Pending: "#ffc107",
  Denied: "#dc3545"
};

export function toCalendarEvents(reservations: Reservation[], users: User[]): CalendarEvent[] {
  const names = new Map(users.map(u => [u.id, u.full_name]));
  return reservations.map(r => ({
    id: r.id,
    title: `#${shortId(r.id)} - ${names.get(r.user_id) ?? "Unknown user"}`,
    start: r.start_at,
    end: r.end_at,
    color: STATUS_COLORS[r.status]
  }));
}

/** First block of a UUID, enough to tell reservations apart on screen. */
export function shortId(id: string): string {
  return id.split("-")[0] ?? id;
}

/** Events bucketed by the UTC day they start on, days ascending. */
export function groupByDay(events: CalendarEvent[]): { day: string; events: CalendarEvent[] }[] {
  const days = new Map<string, CalendarEvent[]>();
  for (const ev of events) {
    const day = new Date(ev.start).toISOString().slice(0, 10);
    const list = days.get(day) ?? [];
    list.push(ev);
    days.set(day, list);
  }
  return Array.from(days.keys())
    .sort()
    .map(day => ({ day, events: days.get(day) ?? [] }));
}
