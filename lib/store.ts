import { createSupabaseServerClient, createSupabaseAuthClient } from "@/lib/supabaseServer";
import { SupabaseStore } from "@/lib/supabaseStore";
import type { Role } from "@/lib/roles";
import type { TicketPatch } from "@/lib/tickets";
import type {
  Equipment,
  Loan,
  Reservation,
  ReservationItem,
  ReservationStatus,
  RoleRecord,
  ServiceTicket,
  TicketUpdate,
  TimeWindow,
  User
} from "@/lib/types";

export type NewUser = {
  id: string;
  email: string;
  full_name: string;
  role_id: number;
  status: string;
};

export type SignedIn = {
  userId: string;
  accessToken: string;
  expiresIn: number;
};

export interface IdentityStore {
  findRole(name: Role): Promise<RoleRecord | null>;
  findUserById(id: string): Promise<User | null>;
  findUserByEmail(email: string): Promise<User | null>;
  /** Every user, by name. */
  listUsers(): Promise<User[]>;
  /** Users among the given ids; unknown ids are skipped. */
  findUsersByIds(ids: string[]): Promise<User[]>;
  insertUser(user: NewUser): Promise<User>;
  /** Creates the password credential and returns its user id. */
  createCredential(email: string, password: string): Promise<string>;
  deleteCredential(userId: string): Promise<void>;
  verifyPassword(email: string, password: string): Promise<SignedIn | null>;
  /** User id behind a still-valid access token. */
  resolveAccessToken(token: string): Promise<string | null>;
}

export type EquipmentInput = Omit<Equipment, "id">;

export interface InventoryStore {
  listEquipment(): Promise<Equipment[]>;
  getEquipment(id: string): Promise<Equipment | null>;
  getEquipmentMany(ids: string[]): Promise<Equipment[]>;
  insertEquipment(input: EquipmentInput): Promise<Equipment>;
  updateEquipment(id: string, input: EquipmentInput): Promise<Equipment | null>;
  deleteEquipment(id: string): Promise<boolean>;
}

export type NewReservation = {
  user_id: string;
  start_at: string;
  end_at: string;
};

export type EquipmentItemCount = {
  equipment_id: string;
  count: number;
};

export interface ReservationStore {
  listReservations(filter?: { userId?: string }): Promise<Reservation[]>;
  getReservation(id: string): Promise<Reservation | null>;
  getReservationsMany(ids: string[]): Promise<Reservation[]>;
  listReservationItems(reservationId: string): Promise<ReservationItem[]>;
  /** Items on this equipment whose Pending/Approved reservation overlaps the window. */
  countBlockingOverlaps(equipmentId: string, window: TimeWindow): Promise<number>;
  /** Reservation (Pending) plus one item per equipment id, in one transaction. */
  createReservation(input: NewReservation, equipmentIds: string[]): Promise<Reservation>;
  /** Only moves a reservation still in `from`; null when it is missing or has moved on. */
  updateReservationStatus(id: string, status: ReservationStatus, from: ReservationStatus): Promise<Reservation | null>;
  /** Aggregated in the database. */
  countItemsByEquipment(): Promise<EquipmentItemCount[]>;
}

export type NewLoan = {
  reservation_id: string;
  checked_out_at: string;
  due_at: string;
};

export interface LoanStore {
  listLoans(): Promise<Loan[]>;
  getLoan(id: string): Promise<Loan | null>;
  getLoanByReservation(reservationId: string): Promise<Loan | null>;
  /**
   * Inserts the loan and marks its reservation Approved, in one transaction
   * that holds the reservation row. Fails if the reservation is Denied by then.
   */
  createLoan(input: NewLoan): Promise<Loan>;
  /** Only touches an outstanding loan; null when it was already returned. */
  markLoanReturned(id: string, returnedAt: string, overdueFee: number): Promise<Loan | null>;
}

export type NewTicket = Omit<ServiceTicket, "id" | "closed_at">;
export type NewTicketUpdate = Omit<TicketUpdate, "id">;

export interface TicketStore {
  listTickets(filter?: { openedBy?: string }): Promise<ServiceTicket[]>;
  getTicket(id: string): Promise<ServiceTicket | null>;
  insertTicket(input: NewTicket): Promise<ServiceTicket>;
  updateTicket(id: string, patch: TicketPatch): Promise<ServiceTicket | null>;
  /** Newest first. */
  listTicketUpdates(ticketId: string): Promise<TicketUpdate[]>;
  insertTicketUpdate(input: NewTicketUpdate): Promise<TicketUpdate>;
}

export type Store = IdentityStore & InventoryStore & ReservationStore & LoanStore & TicketStore;

let store: Store | null = null;

export function getStore(): Store {
  if (!store) store = new SupabaseStore(createSupabaseServerClient(), createSupabaseAuthClient);
  return store;
}
