/**
 * Error responses for route handlers.
 *
 * JSON endpoints answer `{ error, detail, status }`. Form endpoints (plain
 * HTML form posts) answer with a 303 back to a page carrying a flash notice.
 */

import { NextResponse, type NextRequest } from "next/server";
import { isAppError, NotFoundError } from "@/lib/errors";
import { withFlash, type FlashKind } from "@/lib/flash";
import { createLogger, errorMeta } from "@/lib/logger";

const log = createLogger("route");

export interface APIRouteErrorResponse {
  error: string;
  detail: string;
  status?: number;
}

const STATUS_TEXT: Record<number, string> = {
  400: "Validation Error",
  401: "Unauthorized",
  403: "Forbidden",
  404: "Not Found",
  409: "Conflict"
};

/**
 * Consistent JSON error for a failed operation. Unexpected errors are logged
 * and reported as 500 without their internals.
 */
export function handleRouteError(error: unknown, context: string): NextResponse<APIRouteErrorResponse> {
  if (isAppError(error)) {
    return NextResponse.json(
      { error: STATUS_TEXT[error.status] ?? context, detail: error.message, status: error.status },
      { status: error.status }
    );
  }
  log.error(`${context} failed`, errorMeta(error));
  return NextResponse.json({ error: context, detail: "Internal server error", status: 500 }, { status: 500 });
}

export function notFoundError(resource: string): NextResponse<APIRouteErrorResponse> {
  return NextResponse.json({ error: "Not Found", detail: `${resource} not found`, status: 404 }, { status: 404 });
}

/** 303 so the browser follows up with a GET. */
export function redirectTo(request: NextRequest, path: string, flash?: { kind: FlashKind; message: string }): NextResponse {
  const target = flash ? withFlash(path, flash.kind, flash.message) : path;
  return NextResponse.redirect(new URL(target, request.url), 303);
}

/**
 * Failure of a form post: user-caused errors redirect back with a notice,
 * unknown ids are a 404, the rest is a logged 500.
 */
export function handleFormError(
  request: NextRequest,
  error: unknown,
  context: string,
  paths: { retry: string; forbidden?: string }
): NextResponse {
  if (error instanceof NotFoundError) return notFoundError(error.resource);
  if (isAppError(error)) {
    const path = error.status === 403 ? paths.forbidden ?? paths.retry : paths.retry;
    return redirectTo(request, path, { kind: "danger", message: error.message });
  }
  return handleRouteError(error, context);
}
