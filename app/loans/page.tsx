import Link from "next/link";
import { redirect } from "next/navigation";
import FlashMessage from "@/components/FlashMessage";
import { shortId } from "@/lib/calendar";
import { formatDateTime } from "@/lib/dates";
import { withFlash, type SearchParams } from "@/lib/flash";
import { isOverdue, listLoans } from "@/lib/services/loans";
import { requireIdentity } from "@/lib/session";
import { getStore } from "@/lib/store";

export default async function LoansPage({ searchParams }: { searchParams: Promise<SearchParams> }) {
  const actor = await requireIdentity();
  if (!actor.isStaff) redirect(withFlash("/dashboard", "danger", "Only staff may view loans."));
  const rows = await listLoans(getStore(), actor);
  const now = new Date();

  return (
    <div className="stack">
      <h2 className="page-title">Loans</h2>
      <FlashMessage params={await searchParams} />
      <div className="card">
        <table>
          <thead>
            <tr><th>Reservation</th><th>Borrower</th><th>Checked out</th><th>Due</th><th>Returned</th><th>Fee</th><th /></tr>
          </thead>
          <tbody>
            {rows.map(({ loan, borrower }) => (
              <tr key={loan.id}>
                <td><Link href={`/reservations/${loan.reservation_id}`}>{shortId(loan.reservation_id)}</Link></td>
                <td>{borrower?.full_name ?? '—'}</td>
                <td>{formatDateTime(loan.checked_out_at)}</td>
                <td>
                  {formatDateTime(loan.due_at)}
                  {isOverdue(loan, now) && <span className="tag" style={{ marginLeft: 6, background: '#fee2e2' }}>overdue</span>}
                </td>
                <td>{loan.returned_at ? formatDateTime(loan.returned_at) : '—'}</td>
                <td>{loan.overdue_fee.toFixed(2)}</td>
                <td>
                  {loan.returned_at === null && (
                    <form method="post" action={`/loans/return/${loan.id}`}>
                      <button className="btn" type="submit">Mark returned</button>
                    </form>
                  )}
                </td>
              </tr>
            ))}
          </tbody>
        </table>
        {rows.length === 0 && <p className="subtle">No loans yet.</p>}
      </div>
    </div>
  );
}
