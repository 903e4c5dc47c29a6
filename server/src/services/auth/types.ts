// src/services/auth/types.ts
import type { IUser, Role } from "../../models/Users";
import type { IUserActivity } from "../../models/UserActivities";
import type { IUserSession } from "../../models/UserSessions";

/** Caller identity, passed explicitly into every service operation. */
export interface Actor {
  user_id: string;
  role: Role;
  profile_id: string | null;
}

export const STAFF_ROLES: readonly Role[] = ["admin", "nurse", "receptionist"];

export function isStaff(actor: Actor): boolean {
  return STAFF_ROLES.includes(actor.role);
}

export interface LoginCredentials {
  email: string;
  password: string;
}

export interface ClientInfo {
  ip_address: string;
  user_agent: string;
}

export interface TokenPair {
  access_token: string;
  refresh_token: string;
}

export interface AccessClaims {
  sub: string;
  role: Role;
  profile_id: string | null;
  sid: string;
  token_type: "access";
  iat: number;
  exp: number;
}

export interface RefreshClaims {
  sub: string;
  jti: string;
  token_type: "refresh";
  iat: number;
  exp: number;
}

// Persistence port for the auth service. Mongoose and in-memory adapters implement it.
export interface AuthStore {
  findUserByEmail(email: string): Promise<IUser | null>;
  findUserById(userId: string): Promise<IUser | null>;
  /** Counts a failure; on reaching `maxAttempts` sets locked_until and resets the counter. */
  recordFailedLogin(userId: string, maxAttempts: number, lockUntil: Date): Promise<void>;
  resetFailedLogins(userId: string): Promise<void>;
  createSession(session: IUserSession): Promise<void>;
  findSession(sessionId: string): Promise<IUserSession | null>;
  /** Idempotent; keeps the first revoked_at. */
  revokeSession(sessionId: string, at: Date): Promise<void>;
  appendActivity(activity: IUserActivity): Promise<void>;
  /** Newest first. */
  findSessionsByUser(userId: string): Promise<IUserSession[]>;
  /** Newest first, at most `limit`; every user's activity when `userId` is null. */
  listActivities(userId: string | null, limit: number): Promise<IUserActivity[]>;
}
