"use server";

import { redirect } from "next/navigation";
import { failureTarget, withFlash } from "@/lib/flash";
import { createLogger } from "@/lib/logger";
import { createReservation } from "@/lib/services/reservations";
import { requireIdentity } from "@/lib/session";
import { getStore } from "@/lib/store";
import { formFields } from "@/lib/validation";

const log = createLogger("reservation-actions");

export async function createReservationAction(formData: FormData): Promise<void> {
  const actor = await requireIdentity();
  const f = formFields(formData);
  const equipmentIds = formData.getAll("equipment_ids").filter((v): v is string => typeof v === "string");
  let target: string;
  try {
    await createReservation(getStore(), actor, { equipmentIds, startAt: f.start_at, endAt: f.end_at });
    target = withFlash("/reservations", "success", "Reservation submitted for approval.");
  } catch (error) {
    target = failureTarget(error, log, "/reservations/create");
  }
  redirect(target);
}
