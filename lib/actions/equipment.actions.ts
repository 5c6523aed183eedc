"use server";

import { redirect } from "next/navigation";
import { failureTarget, withFlash } from "@/lib/flash";
import { createLogger } from "@/lib/logger";
import { createEquipment, updateEquipment } from "@/lib/services/equipment";
import { requireIdentity } from "@/lib/session";
import { getStore } from "@/lib/store";
import { formFields } from "@/lib/validation";

const log = createLogger("equipment-actions");

export async function createEquipmentAction(formData: FormData): Promise<void> {
  const actor = await requireIdentity();
  let target: string;
  try {
    await createEquipment(getStore(), actor, formFields(formData));
    target = withFlash("/equipment", "success", "Equipment added.");
  } catch (error) {
    target = failureTarget(error, log, "/equipment/create", "/equipment");
  }
  redirect(target);
}

export async function updateEquipmentAction(id: string, formData: FormData): Promise<void> {
  const actor = await requireIdentity();
  let target: string;
  try {
    await updateEquipment(getStore(), actor, id, formFields(formData));
    target = withFlash("/equipment", "success", "Equipment updated.");
  } catch (error) {
    target = failureTarget(error, log, `/equipment/${id}/edit`, "/equipment");
  }
  redirect(target);
}
