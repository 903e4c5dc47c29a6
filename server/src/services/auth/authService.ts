// src/services/auth/authService.ts
import { randomUUID } from "crypto";
import bcrypt from "bcryptjs";
import { addMinutes, addSeconds } from "date-fns";
import { AuthenticationError, InvalidTokenError } from "../../errors";
import type { IUser } from "../../models/Users";
import type { ActivityAction, ActivityOutcome } from "../../models/UserActivities";
import type { IUserActivity } from "../../models/UserActivities";
import type { IUserSession } from "../../models/UserSessions";
import type { TokenService } from "./tokens";
import type { AccessClaims, Actor, AuthStore, ClientInfo, LoginCredentials, TokenPair } from "./types";

export interface LockoutPolicy {
  maxFailedLogins: number;
  lockoutMinutes: number;
}

export interface AuthServiceOptions {
  store: AuthStore;
  tokens: TokenService;
  lockout: LockoutPolicy;
  now?: () => Date;
  newSessionId?: () => string;
}

export const ACTIVITY_PAGE_SIZE = 100;

const NO_CLIENT: ClientInfo = { ip_address: "", user_agent: "" };

// Compared against when the identifier matches no user, so both failure paths pay for one bcrypt round.
let dummyHash: Promise<string> | null = null;
const getDummyHash = () => (dummyHash ??= bcrypt.hash("no-such-user-password", 10));

export function actorFromClaims(claims: AccessClaims): Actor {
  return { user_id: claims.sub, role: claims.role, profile_id: claims.profile_id };
}

/**
 * Login, refresh, logout and verify for JWT access/refresh pairs.
 *
 * Refresh tokens are tied to a revocable session row; access tokens are not,
 * so an access token minted before logout stays valid until it expires.
 */
export class AuthService {
  private readonly store: AuthStore;
  private readonly tokens: TokenService;
  private readonly lockout: LockoutPolicy;
  private readonly now: () => Date;
  private readonly newSessionId: () => string;

  constructor(options: AuthServiceOptions) {
    this.store = options.store;
    this.tokens = options.tokens;
    this.lockout = options.lockout;
    this.now = options.now ?? (() => new Date());
    this.newSessionId = options.newSessionId ?? randomUUID;
  }

  async login(credentials: LoginCredentials, client: ClientInfo = NO_CLIENT): Promise<TokenPair> {
    const now = this.now();
    const identifier = credentials.email.trim().toLowerCase();
    const user = await this.store.findUserByEmail(identifier);

    const passwordMatches = await bcrypt.compare(credentials.password, user ? user.password : await getDummyHash());

    if (!user) {
      return this.rejectLogin(null, identifier, "unknown identifier", client, now);
    }
    if (!user.is_active) {
      return this.rejectLogin(user, identifier, "inactive account", client, now);
    }
    if (user.locked_until && user.locked_until.getTime() > now.getTime()) {
      return this.rejectLogin(user, identifier, "account locked", client, now);
    }
    if (!passwordMatches) {
      await this.store.recordFailedLogin(
        user.user_id,
        this.lockout.maxFailedLogins,
        addMinutes(now, this.lockout.lockoutMinutes)
      );
      return this.rejectLogin(user, identifier, "wrong password", client, now);
    }

    if (user.failed_login_attempts > 0 || user.locked_until !== null) {
      await this.store.resetFailedLogins(user.user_id);
    }

    const session: IUserSession = {
      session_id: this.newSessionId(),
      user_id: user.user_id,
      issued_at: now,
      expires_at: addSeconds(now, this.tokens.refreshTtlSeconds),
      revoked: false,
      revoked_at: null,
      ip_address: client.ip_address,
      user_agent: client.user_agent,
    };
    await this.store.createSession(session);
    await this.recordActivity(user.user_id, identifier, "login", "success", "User logged in", client, now);

    console.log(`User ${user.user_id} logged in (session ${session.session_id})`);
    return {
      access_token: this.tokens.signAccess(user, session.session_id, now),
      refresh_token: this.tokens.signRefresh(user.user_id, session.session_id, now),
    };
  }

  async refresh(refreshToken: string): Promise<{ access_token: string }> {
    const now = this.now();
    const session = await this.activeSessionFor(refreshToken, now);

    const user = await this.store.findUserById(session.user_id);
    if (!user || !user.is_active) {
      throw new InvalidTokenError("User is no longer active");
    }

    return { access_token: this.tokens.signAccess(user, session.session_id, now) };
  }

  async logout(refreshToken: string, client: ClientInfo = NO_CLIENT): Promise<void> {
    const now = this.now();
    const claims = this.tokens.verifyRefresh(refreshToken, now);
    const session = await this.store.findSession(claims.jti);
    if (!session || session.user_id !== claims.sub) {
      throw new InvalidTokenError("Session not found");
    }

    await this.store.revokeSession(session.session_id, now);
    await this.recordActivity(session.user_id, session.user_id, "logout", "success", "User logged out", client, now);
    console.log(`User ${session.user_id} logged out (session ${session.session_id})`);
  }

  // Pure signature/expiry check; no session lookup.
  verify(accessToken: string): AccessClaims {
    return this.tokens.verifyAccess(accessToken, this.now());
  }

  listSessions(actor: Actor): Promise<IUserSession[]> {
    return this.store.findSessionsByUser(actor.user_id);
  }

  // Admins read the whole audit log; everyone else only their own entries.
  listActivities(actor: Actor): Promise<IUserActivity[]> {
    return this.store.listActivities(actor.role === "admin" ? null : actor.user_id, ACTIVITY_PAGE_SIZE);
  }

  private async activeSessionFor(refreshToken: string, now: Date): Promise<IUserSession> {
    const claims = this.tokens.verifyRefresh(refreshToken, now);
    const session = await this.store.findSession(claims.jti);

    if (!session || session.user_id !== claims.sub) {
      throw new InvalidTokenError("Session not found");
    }
    if (session.revoked) {
      throw new InvalidTokenError("Session has been revoked");
    }
    if (session.expires_at.getTime() <= now.getTime()) {
      throw new InvalidTokenError("Session has expired");
    }
    return session;
  }

  private async rejectLogin(
    user: IUser | null,
    identifier: string,
    reason: string,
    client: ClientInfo,
    now: Date
  ): Promise<never> {
    await this.recordActivity(user ? user.user_id : null, identifier, "login", "failure", reason, client, now);
    console.warn(`Failed login attempt for ${identifier}: ${reason}`);
    throw new AuthenticationError();
  }

  private recordActivity(
    userId: string | null,
    identifier: string,
    action: ActivityAction,
    outcome: ActivityOutcome,
    description: string,
    client: ClientInfo,
    now: Date
  ): Promise<void> {
    return this.store.appendActivity({
      user_id: userId,
      identifier,
      action,
      outcome,
      description,
      ip_address: client.ip_address,
      timestamp: now,
    });
  }
}
