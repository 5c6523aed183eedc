import { z } from "zod";
import { ValidationError } from "@/lib/errors";

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function isId(value: string): boolean {
  return UUID.test(value);
}

const trimmed = z.preprocess(v => (typeof v === "string" ? v.trim() : ""), z.string());

export const registerSchema = z.object({
  fullName: trimmed.pipe(z.string().min(1, "All fields are required.")),
  email: trimmed
    .pipe(z.string().min(1, "All fields are required.").email("Please enter a valid email address."))
    .transform(v => v.toLowerCase()),
  password: z.preprocess(v => (typeof v === "string" ? v : ""), z.string().min(1, "All fields are required."))
    .pipe(z.string().min(8, "Password must be at least 8 characters."))
});

export type RegisterInput = { fullName?: string; email?: string; password?: string };

export const loginSchema = z.object({
  email: trimmed.transform(v => v.toLowerCase()),
  password: z.preprocess(v => (typeof v === "string" ? v : ""), z.string())
});

export type LoginInput = { email?: string; password?: string };

const REQUIRED_EQUIPMENT = "Name, category, serial number, and location are required.";

export const equipmentSchema = z.object({
  name: trimmed.pipe(z.string().min(1, REQUIRED_EQUIPMENT)),
  category: trimmed.pipe(z.string().min(1, REQUIRED_EQUIPMENT)),
  serial_number: trimmed.pipe(z.string().min(1, REQUIRED_EQUIPMENT)),
  condition: trimmed.transform(v => v || "Good"),
  location: trimmed.pipe(z.string().min(1, REQUIRED_EQUIPMENT)),
  // unparseable or non-positive limits fall back to 1
  daily_limit: z.preprocess(v => {
    const n = Number.parseInt(typeof v === "string" || typeof v === "number" ? String(v) : "", 10);
    return Number.isFinite(n) && n >= 1 ? n : 1;
  }, z.number().int().min(1))
});

export type EquipmentFormInput = {
  name?: string;
  category?: string;
  serial_number?: string;
  condition?: string;
  location?: string;
  daily_limit?: string | number;
};

/** Runs a schema and raises the first issue as a ValidationError. */
export function validate<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(issue?.message ?? "Invalid input.", issue?.path.join("."));
  }
  return parsed.data;
}

/** Plain object of a form's single-valued fields. */
export function formFields(form: FormData): Record<string, string> {
  const out: Record<string, string> = {};
  form.forEach((value, key) => {
    if (typeof value === "string" && !(key in out)) out[key] = value;
  });
  return out;
}
