import { DEFAULT_LENDING, type LendingConfig } from "@/lib/config";
import { toDateTimeLocal, plusDays } from "@/lib/dates";
import { NotFoundError, ValidationError } from "@/lib/errors";
import { overdueFee } from "@/lib/fees";
import { createLogger } from "@/lib/logger";
import { requireStaff, type Identity } from "@/lib/roles";
import { parseWindow } from "@/lib/services/reservations";
import type { IdentityStore, LoanStore, ReservationStore } from "@/lib/store";
import type { Loan, Reservation, User } from "@/lib/types";

const log = createLogger("loans");

export type LoanRequest = {
  checkedOutAt?: string | null;
  dueAt?: string | null;
};

export async function createLoan(
  store: LoanStore & ReservationStore,
  actor: Identity,
  reservationId: string,
  request: LoanRequest
): Promise<Loan> {
  requireStaff(actor, "Only staff may create loans.");
  const reservation = await store.getReservation(reservationId);
  if (!reservation) throw new NotFoundError("Reservation");
  if (reservation.status === "Denied") {
    throw new ValidationError("A denied reservation cannot be checked out.");
  }
  if (await store.getLoanByReservation(reservationId)) {
    throw new ValidationError("This reservation already has a loan.");
  }

  const { start, end } = parseWindow(request.checkedOutAt, request.dueAt, "Checked-out and due dates are required.");
  if (end.getTime() <= start.getTime()) {
    throw new ValidationError("Due date must be after the checked-out time.", "due_at");
  }

  const loan = await store.createLoan({
    reservation_id: reservationId,
    checked_out_at: start.toISOString(),
    due_at: end.toISOString()
  });
  log.info("loan created", { id: loan.id, reservationId, by: actor.userId });
  return loan;
}

export type LoanFormDefaults = {
  checkedOutAt: string;
  dueAt: string;
};

export function loanFormDefaults(now: Date, lending: LendingConfig = DEFAULT_LENDING): LoanFormDefaults {
  return {
    checkedOutAt: toDateTimeLocal(now),
    dueAt: toDateTimeLocal(plusDays(now, lending.defaultLoanDays))
  };
}

export type ReturnResult = {
  loan: Loan;
  alreadyReturned: boolean;
};

/**
 * Records the return and finalizes the overdue fee. A loan that is already
 * returned is reported as such and left untouched.
 */
export async function returnLoan(
  store: LoanStore,
  actor: Identity,
  loanId: string,
  now: Date,
  lending: LendingConfig = DEFAULT_LENDING
): Promise<ReturnResult> {
  requireStaff(actor, "Only staff may update loans.");
  const loan = await store.getLoan(loanId);
  if (!loan) throw new NotFoundError("Loan");
  if (loan.returned_at !== null) return { loan, alreadyReturned: true };

  const fee = overdueFee(new Date(loan.due_at), now, lending.overdueFeePerDay);
  const updated = await store.markLoanReturned(loanId, now.toISOString(), fee);
  if (!updated) {
    // another request returned it between our read and write
    const current = await store.getLoan(loanId);
    if (!current) throw new NotFoundError("Loan");
    return { loan: current, alreadyReturned: true };
  }
  log.info("loan returned", { id: loanId, fee, by: actor.userId });
  return { loan: updated, alreadyReturned: false };
}

export type LoanRow = {
  loan: Loan;
  reservation: Reservation | null;
  borrower: User | null;
};

export async function listLoans(
  store: LoanStore & ReservationStore & Pick<IdentityStore, "findUsersByIds">,
  actor: Identity
): Promise<LoanRow[]> {
  requireStaff(actor, "Only staff may view loans.");
  const loans = await store.listLoans();
  const reservations = await store.getReservationsMany(loans.map(l => l.reservation_id));
  const users = await store.findUsersByIds(reservations.map(r => r.user_id));
  const resById = new Map(reservations.map(r => [r.id, r]));
  const userById = new Map(users.map(u => [u.id, u]));
  return loans.map(loan => {
    const reservation = resById.get(loan.reservation_id) ?? null;
    return { loan, reservation, borrower: reservation ? userById.get(reservation.user_id) ?? null : null };
  });
}

export function isOverdue(loan: Loan, now: Date): boolean {
  return loan.returned_at === null && new Date(loan.due_at).getTime() < now.getTime();
}
