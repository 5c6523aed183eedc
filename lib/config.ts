import { z } from "zod";

const envSchema = z.object({
  NEXT_PUBLIC_SUPABASE_URL: z.string().url(),
  NEXT_PUBLIC_SUPABASE_ANON_KEY: z.string().min(1),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1),
  OVERDUE_FEE_PER_DAY: z.coerce.number().nonnegative().default(10),
  DEFAULT_LOAN_DAYS: z.coerce.number().int().positive().default(3),
  SESSION_MAX_AGE_SECONDS: z.coerce.number().int().positive().default(3600)
});

export type SupabaseConfig = {
  url: string;
  anonKey: string;
  serviceRoleKey: string;
};

export type LendingConfig = {
  /** Overdue fee charged per whole calendar day past due. */
  overdueFeePerDay: number;
  defaultLoanDays: number;
};

export type AppConfig = {
  supabase: SupabaseConfig;
  lending: LendingConfig;
  sessionMaxAgeSeconds: number;
};

/** Cookie holding the Supabase access token of the signed-in user. */
export const SESSION_COOKIE = "access_token";

export const DEFAULT_LENDING: LendingConfig = { overdueFeePerDay: 10, defaultLoanDays: 3 };

export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const fields = parsed.error.issues.map(i => i.path.join(".")).join(", ");
    throw new Error(`Invalid environment configuration: ${fields}`);
  }
  const e = parsed.data;
  return {
    supabase: {
      url: e.NEXT_PUBLIC_SUPABASE_URL,
      anonKey: e.NEXT_PUBLIC_SUPABASE_ANON_KEY,
      serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY
    },
    lending: {
      overdueFeePerDay: e.OVERDUE_FEE_PER_DAY,
      defaultLoanDays: e.DEFAULT_LOAN_DAYS
    },
    sessionMaxAgeSeconds: e.SESSION_MAX_AGE_SECONDS
  };
}

let cached: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cached) cached = parseConfig(process.env);
  return cached;
}
