import { ValidationError } from "@/lib/errors";
import { canAccessOwned, type Identity } from "@/lib/roles";
import { TICKET_SEVERITIES, TICKET_STATUSES, type ServiceTicket, type TicketSeverity, type TicketStatus } from "@/lib/types";

export function parseTicketStatus(value: unknown): TicketStatus | null {
  return TICKET_STATUSES.find(s => s === value) ?? null;
}

export function parseSeverity(value: unknown): TicketSeverity | null {
  return TICKET_SEVERITIES.find(s => s === value) ?? null;
}

export function canViewTicket(actor: Identity, ticket: Pick<ServiceTicket, "opened_by">): boolean {
  return canAccessOwned(actor, ticket.opened_by);
}

export type TicketEdit = {
  /** Missing keeps the current status. */
  status?: string | null;
  /** Missing or blank clears the assignee. */
  assignedTo?: string | null;
};

export type TicketPatch = Pick<ServiceTicket, "status" | "assigned_to" | "closed_at">;

/**
 * Next status/assignee/closed_at for a staff edit.
 * closed_at is stamped the first time the ticket is Closed and never
 * touched again, whatever happens to the status afterwards.
 */
export function applyTicketEdit(ticket: ServiceTicket, edit: TicketEdit, now: Date): TicketPatch {
  let status = ticket.status;
  if (edit.status) {
    const parsed = parseTicketStatus(edit.status);
    if (!parsed) throw new ValidationError("Invalid status.", "status");
    status = parsed;
  }
  const assigned = (edit.assignedTo ?? "").trim();
  const closed_at = status === "Closed" && ticket.closed_at === null ? now.toISOString() : ticket.closed_at;
  return { status, assigned_to: assigned || null, closed_at };
}
