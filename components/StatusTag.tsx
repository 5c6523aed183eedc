import { STATUS_COLORS } from "@/lib/calendar";
import type { ReservationStatus } from "@/lib/types";

export default function StatusTag({ status }: { status: ReservationStatus }) {
  return <span className="tag" style={{ background: STATUS_COLORS[status], color: status === "Pending" ? "#111827" : "#fff" }}>{status}</span>;
}
