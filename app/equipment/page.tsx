import Link from "next/link";
import FlashMessage from "@/components/FlashMessage";
import type { SearchParams } from "@/lib/flash";
import { listEquipment } from "@/lib/services/equipment";
import { requireIdentity } from "@/lib/session";
import { getStore } from "@/lib/store";

export default async function EquipmentPage({ searchParams }: { searchParams: Promise<SearchParams> }) {
  const actor = await requireIdentity();
  const equipment = await listEquipment(getStore());

  return (
    <div className="stack">
      <div style={{ display: 'flex', justifyContent: 'space-between', alignItems: 'center' }}>
        <h2 className="page-title">Equipment</h2>
        {actor.isStaff && <Link className="btn primary" href="/equipment/create">Add equipment</Link>}
      </div>
      <FlashMessage params={await searchParams} />
      <div className="card">
        <table>
          <thead>
            <tr>
              <th>Name</th><th>Category</th><th>Serial</th><th>Condition</th><th>Location</th><th>Daily limit</th>
              {actor.isStaff && <th />}
            </tr>
          </thead>
          <tbody>
            {equipment.map(e => (
              <tr key={e.id}>
                <td>{e.name}</td>
                <td><span className="tag">{e.category}</span></td>
                <td>{e.serial_number}</td>
                <td>{e.condition}</td>
                <td>{e.location}</td>
                <td>{e.daily_limit}</td>
                {actor.isStaff && (
                  <td style={{ display: 'flex', gap: 6 }}>
                    <Link className="btn" href={`/equipment/${e.id}/edit`}>Edit</Link>
                    <form method="post" action={`/equipment/${e.id}/delete`}>
                      <button className="btn danger" type="submit">Delete</button>
                    </form>
                  </td>
                )}
              </tr>
            ))}
          </tbody>
        </table>
        {equipment.length === 0 && <p className="subtle">No equipment registered yet.</p>}
      </div>
    </div>
  );
}
