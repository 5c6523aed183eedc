"use server";

import { redirect } from "next/navigation";
import { getConfig } from "@/lib/config";
import { failureTarget, withFlash } from "@/lib/flash";
import { createLogger } from "@/lib/logger";
import { authenticate, registerUser } from "@/lib/services/auth";
import { startSession } from "@/lib/session";
import { getStore } from "@/lib/store";
import { formFields } from "@/lib/validation";

const log = createLogger("auth-actions");

export async function registerAction(formData: FormData): Promise<void> {
  const f = formFields(formData);
  let target: string;
  try {
    await registerUser(getStore(), { fullName: f.full_name, email: f.email, password: f.password });
    target = withFlash("/login", "success", "Registration successful. Please log in.");
  } catch (error) {
    target = failureTarget(error, log, "/register");
  }
  redirect(target);
}

export async function loginAction(formData: FormData): Promise<void> {
  const f = formFields(formData);
  let target: string;
  try {
    const session = await authenticate(getStore(), { email: f.email, password: f.password });
    await startSession(session.accessToken, Math.min(session.expiresIn, getConfig().sessionMaxAgeSeconds));
    target = "/dashboard";
  } catch (error) {
    target = failureTarget(error, log, "/login");
  }
  redirect(target);
}
