import { NextResponse, type NextRequest } from "next/server";
import { handleRouteError } from "@/lib/api/route-error-handler";
import { identityFromRequest } from "@/lib/api/request-identity";
import { UnauthorizedError } from "@/lib/errors";
import { reservationsByEquipment } from "@/lib/services/stats";
import { getStore } from "@/lib/store";

export const dynamic = 'force-dynamic';

export async function GET(request: NextRequest) {
  const store = getStore();
  try {
    const actor = await identityFromRequest(request, store);
    if (!actor) throw new UnauthorizedError();
    return NextResponse.json(await reservationsByEquipment(store));
  } catch (error) {
    return handleRouteError(error, "Reservations by equipment");
  }
}
