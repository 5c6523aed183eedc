"use server";

import { redirect } from "next/navigation";
import { failureTarget, withFlash } from "@/lib/flash";
import { createLogger } from "@/lib/logger";
import { createLoan } from "@/lib/services/loans";
import { requireIdentity } from "@/lib/session";
import { getStore } from "@/lib/store";
import { formFields } from "@/lib/validation";

const log = createLogger("loan-actions");

export async function createLoanAction(reservationId: string, formData: FormData): Promise<void> {
  const actor = await requireIdentity();
  const f = formFields(formData);
  let target: string;
  try {
    await createLoan(getStore(), actor, reservationId, { checkedOutAt: f.checked_out_at, dueAt: f.due_at });
    target = withFlash("/loans", "success", "Loan created successfully.");
  } catch (error) {
    target = failureTarget(error, log, `/loans/create/${reservationId}`, "/dashboard");
  }
  redirect(target);
}
