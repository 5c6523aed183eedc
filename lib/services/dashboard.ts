import type { Identity } from "@/lib/roles";
import { isOverdue } from "@/lib/services/loans";
import { listReservations } from "@/lib/services/reservations";
import { listTickets } from "@/lib/services/tickets";
import type { LoanStore, ReservationStore, TicketStore } from "@/lib/store";

export type DashboardCounts = {
  reservations: number;
  pendingReservations: number;
  openTickets: number;
  /** Staff only. */
  outstandingLoans: number | null;
  overdueLoans: number | null;
};

export async function dashboardCounts(
  store: ReservationStore & TicketStore & LoanStore,
  actor: Identity,
  now: Date
): Promise<DashboardCounts> {
  const [reservations, tickets] = await Promise.all([listReservations(store, actor), listTickets(store, actor)]);
  const base = {
    reservations: reservations.length,
    pendingReservations: reservations.filter(r => r.status === "Pending").length,
    openTickets: tickets.filter(t => t.status !== "Closed").length
  };
  if (!actor.isStaff) return { ...base, outstandingLoans: null, overdueLoans: null };

  const loans = await store.listLoans();
  return {
    ...base,
    outstandingLoans: loans.filter(l => l.returned_at === null).length,
    overdueLoans: loans.filter(l => isOverdue(l, now)).length
  };
}
