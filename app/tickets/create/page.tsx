import Link from "next/link";
import FlashMessage from "@/components/FlashMessage";
import { openTicketAction } from "@/lib/actions/tickets.actions";
import type { SearchParams } from "@/lib/flash";
import { requireIdentity } from "@/lib/session";
import { getStore } from "@/lib/store";
import { TICKET_SEVERITIES } from "@/lib/types";

export default async function TicketCreatePage({ searchParams }: { searchParams: Promise<SearchParams> }) {
  const actor = await requireIdentity();
  const store = getStore();
  const [equipment, users] = await Promise.all([
    store.listEquipment(),
    actor.isStaff ? store.listUsers() : Promise.resolve([])
  ]);

  return (
    <div className="stack" style={{ maxWidth: 560 }}>
      <div style={{ display: 'flex', alignItems: 'baseline', gap: 12 }}>
        <h2 className="page-title">Open a service ticket</h2>
        <Link className="btn" href="/tickets">Back</Link>
      </div>
      <FlashMessage params={await searchParams} />
      <form action={openTicketAction} className="form-grid card">
        <label>
          Equipment
          <select name="equipment_id" required defaultValue="">
            <option value="" disabled>(select)</option>
            {equipment.map(e => <option key={e.id} value={e.id}>{e.name} ({e.serial_number})</option>)}
          </select>
        </label>
        <label>
          Severity
          <select name="severity" defaultValue="Medium">
            {TICKET_SEVERITIES.map(s => <option key={s} value={s}>{s}</option>)}
          </select>
        </label>
        <textarea name="description" placeholder="What is wrong?" rows={4} />
        {actor.isStaff && (
          <label>
            Assign to
            <select name="assigned_to" defaultValue="">
              <option value="">(unassigned)</option>
              {users.map(u => <option key={u.id} value={u.id}>{u.full_name}</option>)}
            </select>
          </label>
        )}
        <div><button className="btn primary" type="submit">Open ticket</button></div>
      </form>
    </div>
  );
}
