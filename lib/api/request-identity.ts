import type { NextRequest } from "next/server";
import { SESSION_COOKIE } from "@/lib/config";
import type { Identity } from "@/lib/roles";
import { resolveIdentity } from "@/lib/services/auth";
import type { IdentityStore } from "@/lib/store";

/** Identity from the session cookie of a route handler request. */
export async function identityFromRequest(request: NextRequest, store: IdentityStore): Promise<Identity | null> {
  return resolveIdentity(store, request.cookies.get(SESSION_COOKIE)?.value);
}
