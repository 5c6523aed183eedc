import { ForbiddenError } from "@/lib/errors";

export enum Role {
  Student = "Student",
  TechStaff = "Tech Staff",
  SystemAdmin = "System Admin",
}

export const ROLES: readonly Role[] = [Role.Student, Role.TechStaff, Role.SystemAdmin];

/** The authenticated caller, passed explicitly into every service call. */
export type Identity = {
  userId: string;
  email: string;
  fullName: string;
  role: Role;
  isStaff: boolean;
};

export function isStaff(role: Role): boolean {
  return role === Role.TechStaff || role === Role.SystemAdmin;
}

export function toIdentity(user: { id: string; email: string; full_name: string; role: Role }): Identity {
  return {
    userId: user.id,
    email: user.email,
    fullName: user.full_name,
    role: user.role,
    isStaff: isStaff(user.role)
  };
}

export function requireStaff(actor: Identity, message = "Only staff may perform this action."): void {
  if (!actor.isStaff) throw new ForbiddenError(message);
}

/** Staff see everything; everyone else only what they own. */
export function canAccessOwned(actor: Identity, ownerId: string): boolean {
  return actor.isStaff || actor.userId === ownerId;
}
