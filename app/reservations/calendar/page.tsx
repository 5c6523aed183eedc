import Link from "next/link";
import { groupByDay, toCalendarEvents } from "@/lib/calendar";
import { formatDateTime } from "@/lib/dates";
import { requireIdentity } from "@/lib/session";
import { getStore } from "@/lib/store";

export default async function ReservationsCalendarPage() {
  const actor = await requireIdentity();
  const store = getStore();
  const reservations = await store.listReservations();
  const users = await store.findUsersByIds(reservations.map(r => r.user_id));
  const days = groupByDay(toCalendarEvents(reservations, users));

  return (
    <div className="stack">
      <div style={{ display: 'flex', justifyContent: 'space-between', alignItems: 'center' }}>
        <h2 className="page-title">Reservation calendar</h2>
        <Link className="btn" href="/reservations">List view</Link>
      </div>
      {days.length === 0 && <p className="subtle">Nothing booked.</p>}
      {days.map(d => (
        <section key={d.day} className="card">
          <div className="section-title">{d.day}</div>
          <div className="list">
            {d.events.map(ev => (
              <div key={ev.id} style={{ borderLeft: `4px solid ${ev.color}`, paddingLeft: 8 }}>
                {actor.isStaff ? <Link href={`/reservations/${ev.id}`}>{ev.title}</Link> : <span>{ev.title}</span>}
                <div className="subtle">{formatDateTime(ev.start)} – {formatDateTime(ev.end)}</div>
              </div>
            ))}
          </div>
        </section>
      ))}
    </div>
  );
}
