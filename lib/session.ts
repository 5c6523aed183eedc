import { cookies } from "next/headers";
import { redirect } from "next/navigation";
import { SESSION_COOKIE } from "@/lib/config";
import type { Identity } from "@/lib/roles";
import { resolveIdentity } from "@/lib/services/auth";
import { getStore } from "@/lib/store";

/** Identity of the signed-in user for the current page or action. */
export async function currentIdentity(): Promise<Identity | null> {
  const cookieStore = await cookies();
  return resolveIdentity(getStore(), cookieStore.get(SESSION_COOKIE)?.value);
}

export async function requireIdentity(): Promise<Identity> {
  const identity = await currentIdentity();
  if (!identity) redirect("/login");
  return identity;
}

export async function startSession(accessToken: string, maxAgeSeconds: number): Promise<void> {
  const cookieStore = await cookies();
  cookieStore.set(SESSION_COOKIE, accessToken, {
    httpOnly: true,
    sameSite: "lax",
    secure: process.env.NODE_ENV === "production",
    path: "/",
    maxAge: maxAgeSeconds
  });
}
