import { notFound } from "next/navigation";
import { isAppError, NotFoundError } from "@/lib/errors";
import { errorMeta, type Logger } from "@/lib/logger";

export type FlashKind = "success" | "danger" | "info";

export type Flash = {
  kind: FlashKind;
  message: string;
};

export type SearchParams = Record<string, string | string[] | undefined>;

/** Path with the flash notice carried in its query string. */
export function withFlash(path: string, kind: FlashKind, message: string): string {
  const [base, query = ""] = path.split("?");
  const params = new URLSearchParams(query);
  params.set("notice", message);
  params.set("kind", kind);
  return `${base}?${params.toString()}`;
}

export function readFlash(params: SearchParams): Flash | null {
  const message = params.notice;
  const kind = params.kind;
  if (typeof message !== "string" || !message) return null;
  return { kind: kind === "success" || kind === "danger" || kind === "info" ? kind : "info", message };
}

/**
 * Where a failed server action sends the user. User-caused errors go back
 * with a danger notice; privilege errors may go elsewhere; unknown ids end in
 * a 404 and anything else is rethrown.
 */
export function failureTarget(error: unknown, log: Logger, retryPath: string, forbiddenPath = retryPath): string {
  if (error instanceof NotFoundError) notFound();
  if (!isAppError(error)) {
    log.error("action failed", errorMeta(error));
    throw error;
  }
  return withFlash(error.status === 403 ? forbiddenPath : retryPath, "danger", error.message);
}
