// src/middleware/requireAuth.ts
import { NextFunction, Request, RequestHandler, Response } from "express";
import { sendError } from "../controllers/respond";
import { InvalidTokenError } from "../errors";
import { ROLES, type Role } from "../models/Users";
import { actorFromClaims, type AuthService } from "../services/auth/authService";
import type { Actor } from "../services/auth/types";

const BEARER_RE = /^Bearer\s+(\S+)$/i;

const isRole = (value: unknown): value is Role => typeof value === "string" && ROLES.some((role) => role === value);

function isActor(value: unknown): value is Actor {
  if (typeof value !== "object" || value === null) return false;
  return (
    "user_id" in value &&
    typeof value.user_id === "string" &&
    "role" in value &&
    isRole(value.role) &&
    "profile_id" in value &&
    (value.profile_id === null || typeof value.profile_id === "string")
  );
}

/**
 * Verifies the bearer access token and stores the caller as
 * `res.locals.actor`. Controllers read it through actorOf().
 */
export function requireAuth(auth: AuthService): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const match = BEARER_RE.exec(req.get("authorization") ?? "");
    if (!match) {
      sendError(res, new InvalidTokenError("Authentication credentials were not provided"), "Authentication failed");
      return;
    }

    try {
      res.locals.actor = actorFromClaims(auth.verify(match[1]));
      next();
    } catch (err) {
      sendError(res, err, "Authentication failed");
    }
  };
}

export function actorOf(res: Response): Actor {
  const actor: unknown = res.locals.actor;
  if (!isActor(actor)) {
    throw new InvalidTokenError("Authentication credentials were not provided");
  }
  return actor;
}
