import type { Role } from "@/lib/roles";

export type ReservationStatus = "Pending" | "Approved" | "Denied";
export type TicketStatus = "Open" | "In Progress" | "Closed";
export type TicketSeverity = "Low" | "Medium" | "High" | "Critical";

export const RESERVATION_STATUSES: readonly ReservationStatus[] = ["Pending", "Approved", "Denied"];
export const TICKET_STATUSES: readonly TicketStatus[] = ["Open", "In Progress", "Closed"];
export const TICKET_SEVERITIES: readonly TicketSeverity[] = ["Low", "Medium", "High", "Critical"];

export type RoleRecord = {
  id: number;
  name: Role;
};

export type User = {
  id: string; // same id as the Supabase Auth user
  email: string;
  full_name: string;
  role_id: number;
  role: Role;
  status: string; // 'active' | 'inactive'
};

export type Equipment = {
  id: string;
  name: string;
  category: string;
  serial_number: string;
  condition: string;
  location: string;
  daily_limit: number;
};

export type Reservation = {
  id: string;
  user_id: string;
  start_at: string;
  end_at: string;
  status: ReservationStatus;
  created_at: string;
};

export type ReservationItem = {
  id: string;
  reservation_id: string;
  equipment_id: string;
  notes: string | null;
};

export type Loan = {
  id: string;
  reservation_id: string;
  checked_out_at: string;
  due_at: string;
  returned_at: string | null;
  overdue_fee: number;
  created_at: string;
};

export type ServiceTicket = {
  id: string;
  equipment_id: string;
  severity: TicketSeverity;
  status: TicketStatus;
  description: string;
  opened_by: string;
  assigned_to: string | null;
  opened_at: string;
  closed_at: string | null;
};

export type TicketUpdate = {
  id: string;
  ticket_id: string;
  updated_by: string;
  note: string;
  added_at: string;
};

/** [start, end) */
export type TimeWindow = {
  start: Date;
  end: Date;
};
