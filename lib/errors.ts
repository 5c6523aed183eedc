/**
 * Application errors.
 *
 * Every failure a user can cause (bad input, missing privilege, unknown id,
 * duplicate key) is an AppError carrying the HTTP status it maps to.
 * Anything else coming out of the store is a StoreError and is fatal for the
 * current request.
 */

export class AppError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

export class ValidationError extends AppError {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super(message, 400);
    this.field = field;
  }
}

export class UnavailableEquipmentError extends ValidationError {
  readonly items: string[];

  constructor(items: string[]) {
    super(`Some items are not available for that time window: ${items.join(", ")}`, "equipment_ids");
    this.items = items;
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = "Authentication required") {
    super(message, 401);
  }
}

export class ForbiddenError extends AppError {
  constructor(message = "You do not have permission to perform this action") {
    super(message, 403);
  }
}

export class NotFoundError extends AppError {
  readonly resource: string;

  constructor(resource: string) {
    super(`${resource} not found`, 404);
    this.resource = resource;
  }
}

/** Unique-constraint violation. Shown to the user like a validation error. */
export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409);
  }
}

export class StoreError extends Error {
  readonly code?: string;

  constructor(context: string, message: string, code?: string) {
    super(`${context}: ${message}`);
    this.name = "StoreError";
    this.code = code;
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
