import { isValidWindow, isWithinLimit } from "@/lib/availability";
import { ForbiddenError, NotFoundError, UnavailableEquipmentError, ValidationError } from "@/lib/errors";
import { parseDateTime } from "@/lib/dates";
import { createLogger } from "@/lib/logger";
import { canAccessOwned, requireStaff, type Identity } from "@/lib/roles";
import type { IdentityStore, InventoryStore, LoanStore, ReservationStore } from "@/lib/store";
import {
  RESERVATION_STATUSES,
  type Equipment,
  type Loan,
  type Reservation,
  type ReservationItem,
  type ReservationStatus,
  type TimeWindow,
  type User
} from "@/lib/types";
import { isId } from "@/lib/validation";

const log = createLogger("reservations");

export type AvailabilityStore = InventoryStore & Pick<ReservationStore, "countBlockingOverlaps">;

export type Availability =
  | { available: true; equipment: Equipment; overlapping: number }
  | { available: false; equipment: Equipment | null; overlapping: number };

/** Unknown equipment is never available. */
export async function checkAvailability(store: AvailabilityStore, equipmentId: string, window: TimeWindow): Promise<Availability> {
  const equipment = await store.getEquipment(equipmentId);
  if (!equipment) return { available: false, equipment: null, overlapping: 0 };
  const overlapping = await store.countBlockingOverlaps(equipmentId, window);
  if (isWithinLimit(overlapping, equipment.daily_limit)) return { available: true, equipment, overlapping };
  return { available: false, equipment, overlapping };
}

export type ReservationRequest = {
  equipmentIds: string[];
  startAt?: string | null;
  endAt?: string | null;
};

export function parseWindow(
  startRaw: string | null | undefined,
  endRaw: string | null | undefined,
  missing = "Start and end date are required."
): TimeWindow {
  if (!startRaw?.trim() || !endRaw?.trim()) throw new ValidationError(missing);
  const start = parseDateTime(startRaw);
  const end = parseDateTime(endRaw);
  if (!start || !end) throw new ValidationError("Invalid date format.");
  return { start, end };
}

export async function createReservation(
  store: AvailabilityStore & ReservationStore,
  actor: Identity,
  request: ReservationRequest
): Promise<Reservation> {
  if (request.equipmentIds.length === 0) {
    throw new ValidationError("Please select at least one piece of equipment.", "equipment_ids");
  }
  const window = parseWindow(request.startAt, request.endAt);
  if (!isValidWindow(window)) throw new ValidationError("End date must be after start date.", "end_at");

  // malformed ids are dropped the way unchecked checkboxes would be
  const ids = Array.from(new Set(request.equipmentIds.map(id => id.trim()).filter(isId)));
  if (ids.length === 0) {
    throw new ValidationError("Please select at least one piece of equipment.", "equipment_ids");
  }

  const unavailable: string[] = [];
  for (const id of ids) {
    const result = await checkAvailability(store, id, window);
    if (!result.available) unavailable.push(result.equipment ? result.equipment.name : `ID ${id}`);
  }
  if (unavailable.length > 0) throw new UnavailableEquipmentError(unavailable);

  const reservation = await store.createReservation(
    { user_id: actor.userId, start_at: window.start.toISOString(), end_at: window.end.toISOString() },
    ids
  );
  log.info("reservation created", { id: reservation.id, by: actor.userId, items: ids.length });
  return reservation;
}

export function parseReservationStatus(value: unknown): ReservationStatus | null {
  return RESERVATION_STATUSES.find(s => s === value) ?? null;
}

/**
 * Pending is the only state with outgoing transitions. Re-applying the
 * current status is accepted and changes nothing.
 */
export function canTransition(from: ReservationStatus, to: ReservationStatus): boolean {
  return from === to || from === "Pending";
}

export async function setReservationStatus(
  store: ReservationStore,
  actor: Identity,
  id: string,
  rawStatus: string | null | undefined
): Promise<Reservation> {
  requireStaff(actor, "Only staff may change reservation status.");
  const status = parseReservationStatus(rawStatus);
  if (!status) throw new ValidationError("Invalid status.", "status");

  const reservation = await store.getReservation(id);
  if (!reservation) throw new NotFoundError("Reservation");
  if (!canTransition(reservation.status, status)) {
    throw new ValidationError(`A ${reservation.status} reservation cannot be set to ${status}.`, "status");
  }
  if (reservation.status === status) return reservation;

  const updated = await store.updateReservationStatus(id, status, reservation.status);
  if (!updated) {
    // moved on between our read and write
    const current = await store.getReservation(id);
    if (!current) throw new NotFoundError("Reservation");
    if (current.status === status) return current;
    throw new ValidationError(`A ${current.status} reservation cannot be set to ${status}.`, "status");
  }
  log.info("reservation status changed", { id, from: reservation.status, to: status, by: actor.userId });
  return updated;
}

export async function listReservations(store: ReservationStore, actor: Identity): Promise<Reservation[]> {
  return actor.isStaff ? store.listReservations() : store.listReservations({ userId: actor.userId });
}

export type ReservationSummary = {
  reservation_id: string;
  status: ReservationStatus;
};

export function reservationSummary(reservations: Reservation[]): ReservationSummary[] {
  return reservations.map(r => ({ reservation_id: r.id, status: r.status }));
}

export type ReservationDetail = {
  reservation: Reservation;
  owner: User | null;
  items: (ReservationItem & { equipment: Equipment | null })[];
  loan: Loan | null;
};

export async function getReservationDetail(
  store: ReservationStore & InventoryStore & LoanStore & Pick<IdentityStore, "findUserById">,
  actor: Identity,
  id: string
): Promise<ReservationDetail> {
  const reservation = await store.getReservation(id);
  if (!reservation) throw new NotFoundError("Reservation");
  if (!canAccessOwned(actor, reservation.user_id)) {
    throw new ForbiddenError("You are not allowed to view this reservation.");
  }
  const [owner, items, loan] = await Promise.all([
    store.findUserById(reservation.user_id),
    store.listReservationItems(reservation.id),
    store.getLoanByReservation(reservation.id)
  ]);
  const equipment = await store.getEquipmentMany(items.map(i => i.equipment_id));
  const byId = new Map(equipment.map(e => [e.id, e]));
  return {
    reservation,
    owner,
    items: items.map(i => ({ ...i, equipment: byId.get(i.equipment_id) ?? null })),
    loan
  };
}
