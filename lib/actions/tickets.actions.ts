"use server";

import { redirect } from "next/navigation";
import { failureTarget, withFlash } from "@/lib/flash";
import { createLogger } from "@/lib/logger";
import { addTicketUpdate, openTicket } from "@/lib/services/tickets";
import { requireIdentity } from "@/lib/session";
import { getStore } from "@/lib/store";
import { formFields } from "@/lib/validation";

const log = createLogger("ticket-actions");

export async function openTicketAction(formData: FormData): Promise<void> {
  const actor = await requireIdentity();
  const f = formFields(formData);
  let target: string;
  try {
    await openTicket(
      getStore(),
      actor,
      { equipmentId: f.equipment_id, severity: f.severity, description: f.description, assignedTo: f.assigned_to },
      new Date()
    );
    target = withFlash("/tickets", "success", "Service ticket created.");
  } catch (error) {
    target = failureTarget(error, log, "/tickets/create");
  }
  redirect(target);
}

export async function addTicketUpdateAction(ticketId: string, formData: FormData): Promise<void> {
  const actor = await requireIdentity();
  let target: string;
  try {
    await addTicketUpdate(getStore(), actor, ticketId, formFields(formData).note, new Date());
    target = withFlash(`/tickets/${ticketId}`, "success", "Update added.");
  } catch (error) {
    target = failureTarget(error, log, `/tickets/${ticketId}`, "/tickets");
  }
  redirect(target);
}
