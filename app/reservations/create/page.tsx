import Link from "next/link";
import FlashMessage from "@/components/FlashMessage";
import { createReservationAction } from "@/lib/actions/reservations.actions";
import type { SearchParams } from "@/lib/flash";
import { listEquipment } from "@/lib/services/equipment";
import { requireIdentity } from "@/lib/session";
import { getStore } from "@/lib/store";

export default async function ReservationCreatePage({ searchParams }: { searchParams: Promise<SearchParams> }) {
  await requireIdentity();
  const equipment = await listEquipment(getStore());

  return (
    <div className="stack" style={{ maxWidth: 720 }}>
      <div style={{ display: 'flex', alignItems: 'baseline', gap: 12 }}>
        <h2 className="page-title">New reservation</h2>
        <Link className="btn" href="/reservations">Back</Link>
      </div>
      <FlashMessage params={await searchParams} />
      <form action={createReservationAction} className="form-grid card">
        <label>
          Start
          <input type="datetime-local" name="start_at" required />
        </label>
        <label>
          End
          <input type="datetime-local" name="end_at" required />
        </label>
        <div className="section-title">Equipment</div>
        <div className="list">
          {equipment.map(e => (
            <label key={e.id}>
              <input type="checkbox" name="equipment_ids" value={e.id} /> {e.name}{' '}
              <span className="subtle">({e.category}, {e.serial_number}, {e.location})</span>
            </label>
          ))}
        </div>
        <p className="subtle">Times are UTC. Requests start as Pending until staff approve them.</p>
        <div><button className="btn primary" type="submit">Submit for approval</button></div>
      </form>
    </div>
  );
}
