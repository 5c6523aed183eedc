import Link from "next/link";
import FlashMessage from "@/components/FlashMessage";
import StatusTag from "@/components/StatusTag";
import { shortId } from "@/lib/calendar";
import { formatDateTime } from "@/lib/dates";
import type { SearchParams } from "@/lib/flash";
import { listReservations, reservationSummary } from "@/lib/services/reservations";
import { requireIdentity } from "@/lib/session";
import { getStore } from "@/lib/store";
import { RESERVATION_STATUSES } from "@/lib/types";

export default async function ReservationsPage({ searchParams }: { searchParams: Promise<SearchParams> }) {
  const actor = await requireIdentity();
  const store = getStore();
  const reservations = await listReservations(store, actor);
  const users = actor.isStaff ? await store.findUsersByIds(reservations.map(r => r.user_id)) : [];
  const names = new Map(users.map(u => [u.id, u.full_name]));
  const summary = reservationSummary(reservations);
  const counts = RESERVATION_STATUSES.map(s => ({ status: s, n: summary.filter(r => r.status === s).length }));

  return (
    <div className="stack">
      <div style={{ display: 'flex', justifyContent: 'space-between', alignItems: 'center' }}>
        <h2 className="page-title">{actor.isStaff ? 'Reservations' : 'My reservations'}</h2>
        <div style={{ display: 'flex', gap: 8 }}>
          <Link className="btn" href="/reservations/calendar">Calendar</Link>
          <Link className="btn primary" href="/reservations/create">New reservation</Link>
        </div>
      </div>
      <FlashMessage params={await searchParams} />
      <div className="subtle">
        {counts.map(c => <span key={c.status} style={{ marginRight: 12 }}>{c.status}: <b>{c.n}</b></span>)}
      </div>
      <div className="card">
        <table>
          <thead>
            <tr>
              <th>#</th>
              {actor.isStaff && <th>Requested by</th>}
              <th>Start</th><th>End</th><th>Status</th>
              {actor.isStaff && <th>Decision</th>}
            </tr>
          </thead>
          <tbody>
            {reservations.map(r => (
              <tr key={r.id}>
                <td><Link href={`/reservations/${r.id}`}>{shortId(r.id)}</Link></td>
                {actor.isStaff && <td>{names.get(r.user_id) ?? r.user_id}</td>}
                <td>{formatDateTime(r.start_at)}</td>
                <td>{formatDateTime(r.end_at)}</td>
                <td><StatusTag status={r.status} /></td>
                {actor.isStaff && (
                  <td>
                    {r.status === 'Pending' ? (
                      <div style={{ display: 'flex', gap: 6 }}>
                        <form method="post" action={`/reservations/${r.id}/status`}>
                          <input type="hidden" name="status" value="Approved" />
                          <button className="btn primary" type="submit">Approve</button>
                        </form>
                        <form method="post" action={`/reservations/${r.id}/status`}>
                          <input type="hidden" name="status" value="Denied" />
                          <button className="btn danger" type="submit">Deny</button>
                        </form>
                      </div>
                    ) : r.status === 'Approved' ? (
                      <Link className="btn" href={`/loans/create/${r.id}`}>Check out</Link>
                    ) : null}
                  </td>
                )}
              </tr>
            ))}
          </tbody>
        </table>
        {reservations.length === 0 && <p className="subtle">No reservations.</p>}
      </div>
    </div>
  );
}
