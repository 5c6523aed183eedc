import { ForbiddenError, NotFoundError, ValidationError } from "@/lib/errors";
import { createLogger } from "@/lib/logger";
import { requireStaff, type Identity } from "@/lib/roles";
import { applyTicketEdit, canViewTicket, parseSeverity, type TicketEdit } from "@/lib/tickets";
import type { IdentityStore, InventoryStore, TicketStore } from "@/lib/store";
import type { Equipment, ServiceTicket, TicketUpdate, User } from "@/lib/types";
import { isId } from "@/lib/validation";

const log = createLogger("tickets");

export type TicketRequest = {
  equipmentId?: string | null;
  severity?: string | null;
  description?: string | null;
  assignedTo?: string | null;
};

async function resolveAssignee(store: Pick<IdentityStore, "findUserById">, raw: string | null | undefined): Promise<string | null> {
  const id = (raw ?? "").trim();
  if (!id) return null;
  if (!isId(id) || !(await store.findUserById(id))) throw new ValidationError("Unknown assignee.", "assigned_to");
  return id;
}

export async function openTicket(
  store: TicketStore & InventoryStore & Pick<IdentityStore, "findUserById">,
  actor: Identity,
  request: TicketRequest,
  now: Date
): Promise<ServiceTicket> {
  const equipmentId = (request.equipmentId ?? "").trim();
  if (!equipmentId) throw new ValidationError("Please select equipment.", "equipment_id");
  const equipment = isId(equipmentId) ? await store.getEquipment(equipmentId) : null;
  if (!equipment) throw new ValidationError("Unknown equipment.", "equipment_id");

  const severity = parseSeverity(request.severity);
  if (!severity) throw new ValidationError("Invalid severity.", "severity");

  // only staff may assign while opening
  const assignedTo = actor.isStaff ? await resolveAssignee(store, request.assignedTo) : null;

  const ticket = await store.insertTicket({
    equipment_id: equipment.id,
    severity,
    status: "Open",
    description: (request.description ?? "").trim(),
    opened_by: actor.userId,
    assigned_to: assignedTo,
    opened_at: now.toISOString()
  });
  log.info("ticket opened", { id: ticket.id, equipmentId: equipment.id, severity, by: actor.userId });
  return ticket;
}

async function loadVisibleTicket(store: TicketStore, actor: Identity, id: string): Promise<ServiceTicket> {
  const ticket = await store.getTicket(id);
  if (!ticket) throw new NotFoundError("Ticket");
  if (!canViewTicket(actor, ticket)) throw new ForbiddenError("You are not allowed to view this ticket.");
  return ticket;
}

export async function editTicket(
  store: TicketStore & Pick<IdentityStore, "findUserById">,
  actor: Identity,
  id: string,
  edit: TicketEdit,
  now: Date
): Promise<ServiceTicket> {
  requireStaff(actor, "Only staff may edit tickets.");
  const ticket = await store.getTicket(id);
  if (!ticket) throw new NotFoundError("Ticket");

  const patch = applyTicketEdit(ticket, edit, now);
  patch.assigned_to = await resolveAssignee(store, patch.assigned_to);

  const updated = await store.updateTicket(id, patch);
  if (!updated) throw new NotFoundError("Ticket");
  log.info("ticket updated", { id, status: updated.status, assignedTo: updated.assigned_to, by: actor.userId });
  return updated;
}

export async function addTicketUpdate(
  store: TicketStore,
  actor: Identity,
  id: string,
  rawNote: string | null | undefined,
  now: Date
): Promise<TicketUpdate> {
  const ticket = await loadVisibleTicket(store, actor, id);
  const note = (rawNote ?? "").trim();
  if (!note) throw new ValidationError("Update text is required.", "note");
  return store.insertTicketUpdate({ ticket_id: ticket.id, updated_by: actor.userId, note, added_at: now.toISOString() });
}

export async function listTickets(store: TicketStore, actor: Identity): Promise<ServiceTicket[]> {
  return actor.isStaff ? store.listTickets() : store.listTickets({ openedBy: actor.userId });
}

export type TicketDetail = {
  ticket: ServiceTicket;
  equipment: Equipment | null;
  openedBy: User | null;
  assignedTo: User | null;
  updates: (TicketUpdate & { author: User | null })[];
};

export async function getTicketDetail(
  store: TicketStore & InventoryStore & Pick<IdentityStore, "findUsersByIds">,
  actor: Identity,
  id: string
): Promise<TicketDetail> {
  const ticket = await loadVisibleTicket(store, actor, id);
  const [equipment, updates] = await Promise.all([
    store.getEquipment(ticket.equipment_id),
    store.listTicketUpdates(ticket.id)
  ]);
  const users = await store.findUsersByIds([
    ticket.opened_by,
    ...(ticket.assigned_to ? [ticket.assigned_to] : []),
    ...updates.map(u => u.updated_by)
  ]);
  const userById = new Map(users.map(u => [u.id, u]));
  return {
    ticket,
    equipment,
    openedBy: userById.get(ticket.opened_by) ?? null,
    assignedTo: ticket.assigned_to ? userById.get(ticket.assigned_to) ?? null : null,
    updates: updates.map(u => ({ ...u, author: userById.get(u.updated_by) ?? null }))
  };
}
