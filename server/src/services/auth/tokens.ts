// src/services/auth/tokens.ts
import jwt from "jsonwebtoken";
import { z } from "zod";
import { InvalidTokenError } from "../../errors";
import { ROLES, type IUser } from "../../models/Users";
import type { AccessClaims, RefreshClaims } from "./types";

const ALGORITHM = "HS256";

const AccessClaimsSchema = z.object({
  sub: z.string().min(1),
  role: z.enum(ROLES),
  profile_id: z.string().nullable(),
  sid: z.string().min(1),
  token_type: z.literal("access"),
  iat: z.number(),
  exp: z.number(),
});

const RefreshClaimsSchema = z.object({
  sub: z.string().min(1),
  jti: z.string().min(1),
  token_type: z.literal("refresh"),
  iat: z.number(),
  exp: z.number(),
});

export interface TokenSettings {
  secret: string;
  accessTtlSeconds: number;
  refreshTtlSeconds: number;
}

const toEpochSeconds = (at: Date) => Math.floor(at.getTime() / 1000);

/**
 * Signs and verifies HS256 JWTs. Every call takes the current time so the
 * auth service's clock decides issue and expiry, not Date.now().
 */
export class TokenService {
  constructor(private readonly settings: TokenSettings) {}

  get refreshTtlSeconds(): number {
    return this.settings.refreshTtlSeconds;
  }

  signAccess(user: Pick<IUser, "user_id" | "role" | "profile_id">, sessionId: string, now: Date): string {
    return jwt.sign(
      {
        sub: user.user_id,
        role: user.role,
        profile_id: user.profile_id,
        sid: sessionId,
        token_type: "access",
        iat: toEpochSeconds(now),
      },
      this.settings.secret,
      { algorithm: ALGORITHM, expiresIn: this.settings.accessTtlSeconds }
    );
  }

  signRefresh(userId: string, sessionId: string, now: Date): string {
    return jwt.sign(
      { sub: userId, jti: sessionId, token_type: "refresh", iat: toEpochSeconds(now) },
      this.settings.secret,
      { algorithm: ALGORITHM, expiresIn: this.settings.refreshTtlSeconds }
    );
  }

  verifyAccess(token: string, now: Date): AccessClaims {
    const claims = AccessClaimsSchema.safeParse(this.decode(token, now));
    if (!claims.success) throw new InvalidTokenError("Token is not an access token");
    return claims.data;
  }

  verifyRefresh(token: string, now: Date): RefreshClaims {
    const claims = RefreshClaimsSchema.safeParse(this.decode(token, now));
    if (!claims.success) throw new InvalidTokenError("Token is not a refresh token");
    return claims.data;
  }

  private decode(token: string, now: Date): unknown {
    try {
      return jwt.verify(token, this.settings.secret, {
        algorithms: [ALGORITHM],
        clockTimestamp: toEpochSeconds(now),
      });
    } catch (err) {
      if (err instanceof jwt.TokenExpiredError) throw new InvalidTokenError("Token has expired");
      if (err instanceof jwt.JsonWebTokenError) throw new InvalidTokenError("Token is invalid");
      throw err;
    }
  }
}
