import type { NextRequest } from "next/server";
import { redirectTo } from "@/lib/api/route-error-handler";
import { SESSION_COOKIE } from "@/lib/config";

export async function GET(request: NextRequest) {
  const res = redirectTo(request, "/login", { kind: "info", message: "You have been logged out." });
  res.cookies.delete(SESSION_COOKIE);
  return res;
}
