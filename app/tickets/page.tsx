import Link from "next/link";
import FlashMessage from "@/components/FlashMessage";
import { shortId } from "@/lib/calendar";
import { formatDateTime } from "@/lib/dates";
import type { SearchParams } from "@/lib/flash";
import { listTickets } from "@/lib/services/tickets";
import { requireIdentity } from "@/lib/session";
import { getStore } from "@/lib/store";

export default async function TicketsPage({ searchParams }: { searchParams: Promise<SearchParams> }) {
  const actor = await requireIdentity();
  const store = getStore();
  const [tickets, equipment] = await Promise.all([listTickets(store, actor), store.listEquipment()]);
  const eqName = new Map(equipment.map(e => [e.id, e.name]));

  return (
    <div className="stack">
      <div style={{ display: 'flex', justifyContent: 'space-between', alignItems: 'center' }}>
        <h2 className="page-title">{actor.isStaff ? 'Service tickets' : 'My service tickets'}</h2>
        <Link className="btn primary" href="/tickets/create">Open ticket</Link>
      </div>
      <FlashMessage params={await searchParams} />
      <div className="card">
        <table>
          <thead>
            <tr><th>#</th><th>Equipment</th><th>Severity</th><th>Status</th><th>Opened</th><th>Closed</th></tr>
          </thead>
          <tbody>
            {tickets.map(t => (
              <tr key={t.id}>
                <td><Link href={`/tickets/${t.id}`}>{shortId(t.id)}</Link></td>
                <td>{eqName.get(t.equipment_id) ?? t.equipment_id}</td>
                <td>{t.severity}</td>
                <td><span className="tag">{t.status}</span></td>
                <td>{formatDateTime(t.opened_at)}</td>
                <td>{formatDateTime(t.closed_at)}</td>
              </tr>
            ))}
          </tbody>
        </table>
        {tickets.length === 0 && <p className="subtle">No tickets.</p>}
      </div>
    </div>
  );
}
