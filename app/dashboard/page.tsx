import Link from "next/link";
import FlashMessage from "@/components/FlashMessage";
import ReservationsByEquipmentChart from "@/components/ReservationsByEquipmentChart";
import type { SearchParams } from "@/lib/flash";
import { dashboardCounts } from "@/lib/services/dashboard";
import { requireIdentity } from "@/lib/session";
import { getStore } from "@/lib/store";

export default async function DashboardPage({ searchParams }: { searchParams: Promise<SearchParams> }) {
  const actor = await requireIdentity();
  const counts = await dashboardCounts(getStore(), actor, new Date());

  return (
    <div className="stack">
      <h2 className="page-title">Dashboard</h2>
      <FlashMessage params={await searchParams} />
      <div style={{ display: 'grid', gridTemplateColumns: 'repeat(auto-fill, minmax(180px, 1fr))', gap: 12 }}>
        <div className="card">
          <div className="subtle">{actor.isStaff ? 'Reservations' : 'My reservations'}</div>
          <b>{counts.reservations}</b> <span className="subtle">({counts.pendingReservations} pending)</span>
        </div>
        <div className="card">
          <div className="subtle">Open tickets</div>
          <b>{counts.openTickets}</b>
        </div>
        {counts.outstandingLoans !== null && (
          <div className="card">
            <div className="subtle">Outstanding loans</div>
            <b>{counts.outstandingLoans}</b> <span className="subtle">({counts.overdueLoans} overdue)</span>
          </div>
        )}
      </div>
      <div style={{ display: 'flex', gap: 8 }}>
        <Link className="btn primary" href="/reservations/create">New reservation</Link>
        <Link className="btn" href="/tickets/create">Report a problem</Link>
      </div>
      <section className="card">
        <div className="section-title">Reservations by equipment</div>
        <ReservationsByEquipmentChart />
      </section>
    </div>
  );
}
