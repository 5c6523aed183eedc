import { NotFoundError, ValidationError } from "@/lib/errors";
import { createLogger, errorMeta } from "@/lib/logger";
import { Role, toIdentity, type Identity } from "@/lib/roles";
import type { IdentityStore } from "@/lib/store";
import type { User } from "@/lib/types";
import { loginSchema, registerSchema, validate, type LoginInput, type RegisterInput } from "@/lib/validation";

const log = createLogger("auth");

const INVALID_LOGIN = "Invalid email or password.";

/**
 * Self-registration always yields a Student account. Staff accounts are
 * provisioned by an administrator.
 */
export async function registerUser(store: IdentityStore, input: RegisterInput): Promise<User> {
  const { fullName, email, password } = validate(registerSchema, input);

  if (await store.findUserByEmail(email)) {
    throw new ValidationError("Email already registered.", "email");
  }
  const role = await store.findRole(Role.Student);
  if (!role) throw new NotFoundError("Role Student");

  const userId = await store.createCredential(email, password);
  try {
    const user = await store.insertUser({ id: userId, email, full_name: fullName, role_id: role.id, status: "active" });
    log.info("user registered", { userId });
    return user;
  } catch (error) {
    // keep credential and profile in step
    try {
      await store.deleteCredential(userId);
      log.warn("registration rolled back", { userId, ...errorMeta(error) });
    } catch (rollbackError) {
      log.error("registration rollback failed, credential left behind", { userId, ...errorMeta(rollbackError) });
    }
    throw error;
  }
}

export type Session = {
  identity: Identity;
  accessToken: string;
  expiresIn: number;
};

export async function authenticate(store: IdentityStore, input: LoginInput): Promise<Session> {
  const { email, password } = validate(loginSchema, input);
  if (!email || !password) throw new ValidationError(INVALID_LOGIN);

  const signedIn = await store.verifyPassword(email, password);
  if (!signedIn) throw new ValidationError(INVALID_LOGIN);

  const user = await store.findUserById(signedIn.userId);
  if (!user || user.status !== "active") {
    log.warn("sign-in refused", { userId: signedIn.userId, status: user?.status ?? "missing profile" });
    throw new ValidationError(INVALID_LOGIN);
  }
  return { identity: toIdentity(user), accessToken: signedIn.accessToken, expiresIn: signedIn.expiresIn };
}

/** Identity behind an access token, or null when the token or profile is gone. */
export async function resolveIdentity(store: IdentityStore, token: string | undefined): Promise<Identity | null> {
  if (!token) return null;
  const userId = await store.resolveAccessToken(token);
  if (!userId) return null;
  const user = await store.findUserById(userId);
  if (!user || user.status !== "active") return null;
  return toIdentity(user);
}
