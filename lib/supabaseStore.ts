import type { PostgrestError, SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { ConflictError, NotFoundError, StoreError, UnavailableEquipmentError, ValidationError } from "@/lib/errors";
import { createLogger } from "@/lib/logger";
import { Role } from "@/lib/roles";
import type {
  EquipmentInput,
  EquipmentItemCount,
  NewLoan,
  NewReservation,
  NewTicket,
  NewTicketUpdate,
  NewUser,
  SignedIn,
  Store
} from "@/lib/store";
import type { TicketPatch } from "@/lib/tickets";
import { isId } from "@/lib/validation";
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

const log = createLogger("store");

const roleRow = z.object({ id: z.number(), name: z.nativeEnum(Role) });

const USER_COLUMNS = "id,email,full_name,role_id,status,roles(name)";
const userRow = z
  .object({
    id: z.string(),
    email: z.string(),
    full_name: z.string(),
    role_id: z.number(),
    status: z.string(),
    roles: z.object({ name: z.nativeEnum(Role) })
  })
  .transform(({ roles, ...u }): User => ({ ...u, role: roles.name }));

const equipmentRow = z.object({
  id: z.string(),
  name: z.string(),
  category: z.string(),
  serial_number: z.string(),
  condition: z.string(),
  location: z.string(),
  daily_limit: z.number()
});

const reservationRow = z.object({
  id: z.string(),
  user_id: z.string(),
  start_at: z.string(),
  end_at: z.string(),
  status: z.enum(["Pending", "Approved", "Denied"]),
  created_at: z.string()
});

const reservationItemRow = z.object({
  id: z.string(),
  reservation_id: z.string(),
  equipment_id: z.string(),
  notes: z.string().nullable()
});

const loanRow = z.object({
  id: z.string(),
  reservation_id: z.string(),
  checked_out_at: z.string(),
  due_at: z.string(),
  returned_at: z.string().nullable(),
  overdue_fee: z.coerce.number(),
  created_at: z.string()
});

const ticketRow = z.object({
  id: z.string(),
  equipment_id: z.string(),
  severity: z.enum(["Low", "Medium", "High", "Critical"]),
  status: z.enum(["Open", "In Progress", "Closed"]),
  description: z.string(),
  opened_by: z.string(),
  assigned_to: z.string().nullable(),
  opened_at: z.string(),
  closed_at: z.string().nullable()
});

const ticketUpdateRow = z.object({
  id: z.string(),
  ticket_id: z.string(),
  updated_by: z.string(),
  note: z.string(),
  added_at: z.string()
});

const UNIQUE_VIOLATION = "23505";
const FOREIGN_KEY_VIOLATION = "23503";
const RAISED_EXCEPTION = "P0001";

/** Below PostgREST's default max_rows, which truncates a single response. */
const USER_PAGE_SIZE = 500;

/** Auth error codes caused by what the user typed. */
const AUTH_INPUT_ERRORS = new Set(["validation_failed", "weak_password", "email_address_invalid"]);

function uniqueIds(ids: string[]): string[] {
  return Array.from(new Set(ids)).filter(isId);
}

type Result = { data: unknown; error: PostgrestError | null };

function fail(context: string, error: PostgrestError): never {
  log.error(`${context} failed`, { code: error.code, message: error.message });
  throw new StoreError(context, error.message, error.code);
}

function one<S extends z.ZodTypeAny>(schema: S, res: Result, context: string): z.output<S> {
  if (res.error) fail(context, res.error);
  const parsed = schema.safeParse(res.data);
  if (!parsed.success) throw new StoreError(context, `unexpected row shape: ${parsed.error.message}`);
  return parsed.data;
}

function maybeOne<S extends z.ZodTypeAny>(schema: S, res: Result, context: string): z.output<S> | null {
  if (res.error) fail(context, res.error);
  return res.data === null ? null : one(schema, res, context);
}

function many<S extends z.ZodTypeAny>(schema: S, res: Result, context: string): z.output<S>[] {
  return one(z.array(schema), { data: res.data ?? [], error: res.error }, context);
}

/** Ids that are not UUIDs cannot exist; they are answered as "not found" without a query. */
export class SupabaseStore implements Store {
  constructor(
    private readonly db: SupabaseClient,
    private readonly authClient: () => SupabaseClient
  ) {}

  // ---- identity ----

  async findRole(name: Role): Promise<RoleRecord | null> {
    const res = await this.db.from("roles").select("id,name").eq("name", name).maybeSingle();
    return maybeOne(roleRow, res, "find role");
  }

  async findUserById(id: string): Promise<User | null> {
    if (!isId(id)) return null;
    const res = await this.db.from("users").select(USER_COLUMNS).eq("id", id).maybeSingle();
    return maybeOne(userRow, res, "find user");
  }

  async findUserByEmail(email: string): Promise<User | null> {
    const res = await this.db.from("users").select(USER_COLUMNS).eq("email", email).maybeSingle();
    return maybeOne(userRow, res, "find user by email");
  }

  async listUsers(): Promise<User[]> {
    const users: User[] = [];
    for (let from = 0; ; from += USER_PAGE_SIZE) {
      const res = await this.db
        .from("users")
        .select(USER_COLUMNS)
        .order("full_name")
        .order("id")
        .range(from, from + USER_PAGE_SIZE - 1);
      const page = many(userRow, res, "list users");
      users.push(...page);
      if (page.length < USER_PAGE_SIZE) return users;
    }
  }

  async findUsersByIds(ids: string[]): Promise<User[]> {
    const wanted = uniqueIds(ids);
    if (wanted.length === 0) return [];
    const res = await this.db.from("users").select(USER_COLUMNS).in("id", wanted);
    return many(userRow, res, "find users");
  }

  async insertUser(user: NewUser): Promise<User> {
    const res = await this.db.from("users").insert(user).select(USER_COLUMNS).single();
    if (res.error?.code === UNIQUE_VIOLATION) throw new ConflictError("Email already registered.");
    return one(userRow, res, "insert user");
  }

  async createCredential(email: string, password: string): Promise<string> {
    const { data, error } = await this.db.auth.admin.createUser({ email, password, email_confirm: true });
    if (error) {
      if (error.code === "email_exists") throw new ConflictError("Email already registered.");
      if (error.code && AUTH_INPUT_ERRORS.has(error.code)) throw new ValidationError(error.message);
      log.error("create credential failed", { status: error.status, message: error.message });
      throw new StoreError("create credential", error.message, error.code);
    }
    return data.user.id;
  }

  async deleteCredential(userId: string): Promise<void> {
    const { error } = await this.db.auth.admin.deleteUser(userId);
    if (error) throw new StoreError("delete credential", error.message, error.code);
  }

  async verifyPassword(email: string, password: string): Promise<SignedIn | null> {
    const { data, error } = await this.authClient().auth.signInWithPassword({ email, password });
    if (error) {
      if (error.code === "invalid_credentials") return null;
      log.error("password sign-in failed", { status: error.status, code: error.code, message: error.message });
      throw new StoreError("sign in", error.message, error.code);
    }
    return { userId: data.user.id, accessToken: data.session.access_token, expiresIn: data.session.expires_in };
  }

  async resolveAccessToken(token: string): Promise<string | null> {
    const { data, error } = await this.db.auth.getUser(token);
    if (error) return null;
    return data.user.id;
  }

  // ---- inventory ----

  async listEquipment(): Promise<Equipment[]> {
    const res = await this.db.from("equipment").select("*").order("name").order("serial_number");
    return many(equipmentRow, res, "list equipment");
  }

  async getEquipment(id: string): Promise<Equipment | null> {
    if (!isId(id)) return null;
    const res = await this.db.from("equipment").select("*").eq("id", id).maybeSingle();
    return maybeOne(equipmentRow, res, "get equipment");
  }

  async getEquipmentMany(ids: string[]): Promise<Equipment[]> {
    if (ids.length === 0) return [];
    const res = await this.db.from("equipment").select("*").in("id", ids);
    return many(equipmentRow, res, "get equipment");
  }

  async insertEquipment(input: EquipmentInput): Promise<Equipment> {
    const res = await this.db.from("equipment").insert(input).select("*").single();
    if (res.error?.code === UNIQUE_VIOLATION) throw new ConflictError("Serial number already exists.");
    return one(equipmentRow, res, "insert equipment");
  }

  async updateEquipment(id: string, input: EquipmentInput): Promise<Equipment | null> {
    if (!isId(id)) return null;
    const res = await this.db.from("equipment").update(input).eq("id", id).select("*").maybeSingle();
    if (res.error?.code === UNIQUE_VIOLATION) throw new ConflictError("Serial number already exists.");
    return maybeOne(equipmentRow, res, "update equipment");
  }

  async deleteEquipment(id: string): Promise<boolean> {
    if (!isId(id)) return false;
    const res = await this.db.from("equipment").delete().eq("id", id).select("id");
    if (res.error?.code === FOREIGN_KEY_VIOLATION) {
      throw new ValidationError("Equipment is referenced by reservations or tickets and cannot be deleted.");
    }
    return many(z.object({ id: z.string() }), res, "delete equipment").length > 0;
  }

  // ---- reservations ----

  async listReservations(filter: { userId?: string } = {}): Promise<Reservation[]> {
    let q = this.db.from("reservations").select("*");
    if (filter.userId) q = q.eq("user_id", filter.userId);
    const res = await q.order("start_at");
    return many(reservationRow, res, "list reservations");
  }

  async getReservation(id: string): Promise<Reservation | null> {
    if (!isId(id)) return null;
    const res = await this.db.from("reservations").select("*").eq("id", id).maybeSingle();
    return maybeOne(reservationRow, res, "get reservation");
  }

  async getReservationsMany(ids: string[]): Promise<Reservation[]> {
    const wanted = uniqueIds(ids);
    if (wanted.length === 0) return [];
    const res = await this.db.from("reservations").select("*").in("id", wanted);
    return many(reservationRow, res, "get reservations");
  }

  async listReservationItems(reservationId: string): Promise<ReservationItem[]> {
    const res = await this.db.from("reservation_items").select("*").eq("reservation_id", reservationId);
    return many(reservationItemRow, res, "list reservation items");
  }

  async countBlockingOverlaps(equipmentId: string, window: TimeWindow): Promise<number> {
    const { count, error } = await this.db
      .from("reservation_items")
      .select("id, reservations!inner(status,start_at,end_at)", { count: "exact", head: true })
      .eq("equipment_id", equipmentId)
      .in("reservations.status", ["Pending", "Approved"])
      .lt("reservations.start_at", window.end.toISOString())
      .gt("reservations.end_at", window.start.toISOString());
    if (error) fail("count overlaps", error);
    return count ?? 0;
  }

  async createReservation(input: NewReservation, equipmentIds: string[]): Promise<Reservation> {
    const res = await this.db.rpc("create_reservation", {
      p_user_id: input.user_id,
      p_start_at: input.start_at,
      p_end_at: input.end_at,
      p_equipment_ids: equipmentIds
    });
    // Raised by the function when another booking took the last slot meanwhile.
    if (res.error?.code === RAISED_EXCEPTION && res.error.message === "equipment_unavailable") {
      throw new UnavailableEquipmentError((res.error.details ?? "").split(", ").filter(Boolean));
    }
    return one(reservationRow, res, "create reservation");
  }

  async updateReservationStatus(id: string, status: ReservationStatus, from: ReservationStatus): Promise<Reservation | null> {
    if (!isId(id)) return null;
    const res = await this.db
      .from("reservations")
      .update({ status })
      .eq("id", id)
      .eq("status", from)
      .select("*")
      .maybeSingle();
    return maybeOne(reservationRow, res, "update reservation status");
  }

  async countItemsByEquipment(): Promise<EquipmentItemCount[]> {
    const res = await this.db.rpc("reservations_by_equipment");
    return many(z.object({ equipment_id: z.string(), count: z.coerce.number() }), res, "count reservation items");
  }

  // ---- loans ----

  async listLoans(): Promise<Loan[]> {
    const res = await this.db.from("loans").select("*").order("created_at");
    return many(loanRow, res, "list loans");
  }

  async getLoan(id: string): Promise<Loan | null> {
    if (!isId(id)) return null;
    const res = await this.db.from("loans").select("*").eq("id", id).maybeSingle();
    return maybeOne(loanRow, res, "get loan");
  }

  async getLoanByReservation(reservationId: string): Promise<Loan | null> {
    if (!isId(reservationId)) return null;
    const res = await this.db.from("loans").select("*").eq("reservation_id", reservationId).maybeSingle();
    return maybeOne(loanRow, res, "get loan by reservation");
  }

  async createLoan(input: NewLoan): Promise<Loan> {
    const res = await this.db.rpc("create_loan", {
      p_reservation_id: input.reservation_id,
      p_checked_out_at: input.checked_out_at,
      p_due_at: input.due_at
    });
    if (res.error?.code === UNIQUE_VIOLATION) throw new ConflictError("This reservation already has a loan.");
    if (res.error?.code === RAISED_EXCEPTION && res.error.message === "reservation_denied") {
      throw new ValidationError("A denied reservation cannot be checked out.");
    }
    if (res.error?.code === RAISED_EXCEPTION && res.error.message === "reservation_not_found") {
      throw new NotFoundError("Reservation");
    }
    return one(loanRow, res, "create loan");
  }

  async markLoanReturned(id: string, returnedAt: string, overdueFee: number): Promise<Loan | null> {
    if (!isId(id)) return null;
    const res = await this.db
      .from("loans")
      .update({ returned_at: returnedAt, overdue_fee: overdueFee })
      .eq("id", id)
      .is("returned_at", null)
      .select("*")
      .maybeSingle();
    return maybeOne(loanRow, res, "return loan");
  }

  // ---- tickets ----

  async listTickets(filter: { openedBy?: string } = {}): Promise<ServiceTicket[]> {
    let q = this.db.from("service_tickets").select("*");
    if (filter.openedBy) q = q.eq("opened_by", filter.openedBy);
    const res = await q.order("opened_at", { ascending: false });
    return many(ticketRow, res, "list tickets");
  }

  async getTicket(id: string): Promise<ServiceTicket | null> {
    if (!isId(id)) return null;
    const res = await this.db.from("service_tickets").select("*").eq("id", id).maybeSingle();
    return maybeOne(ticketRow, res, "get ticket");
  }

  async insertTicket(input: NewTicket): Promise<ServiceTicket> {
    const res = await this.db.from("service_tickets").insert(input).select("*").single();
    return one(ticketRow, res, "insert ticket");
  }

  async updateTicket(id: string, patch: TicketPatch): Promise<ServiceTicket | null> {
    if (!isId(id)) return null;
    const res = await this.db.from("service_tickets").update(patch).eq("id", id).select("*").maybeSingle();
    return maybeOne(ticketRow, res, "update ticket");
  }

  async listTicketUpdates(ticketId: string): Promise<TicketUpdate[]> {
    const res = await this.db
      .from("ticket_updates")
      .select("*")
      .eq("ticket_id", ticketId)
      .order("added_at", { ascending: false });
    return many(ticketUpdateRow, res, "list ticket updates");
  }

  async insertTicketUpdate(input: NewTicketUpdate): Promise<TicketUpdate> {
    const res = await this.db.from("ticket_updates").insert(input).select("*").single();
    return one(ticketUpdateRow, res, "insert ticket update");
  }
}
