// src/controllers/auth.ts
import { Request, Response } from "express";
import { actorOf } from "../middleware/requireAuth";
import type { AuthService } from "../services/auth/authService";
import type { ClientInfo } from "../services/auth/types";
import { parseLoginCredentials, parseRefreshToken, parseVerifyToken } from "../services/auth/validation";
import { sendError } from "./respond";

const clientOf = (req: Request): ClientInfo => ({
  ip_address: req.ip ?? "",
  user_agent: req.get("user-agent") ?? "",
});

export function createAuthController(auth: AuthService) {
  // POST /api/auth/login
  const login = async (req: Request, res: Response) => {
    try {
      const credentials = parseLoginCredentials(req.body);
      const tokens = await auth.login(credentials, clientOf(req));
      return res.status(200).json({ success: true, data: tokens });
    } catch (err) {
      return sendError(res, err, "Error during login");
    }
  };

  // POST /api/auth/refresh
  const refresh = async (req: Request, res: Response) => {
    try {
      const data = await auth.refresh(parseRefreshToken(req.body));
      return res.status(200).json({ success: true, data });
    } catch (err) {
      return sendError(res, err, "Error refreshing token");
    }
  };

  // POST /api/auth/logout
  const logout = async (req: Request, res: Response) => {
    try {
      await auth.logout(parseRefreshToken(req.body), clientOf(req));
      return res.status(200).json({ success: true, message: "Successfully logged out" });
    } catch (err) {
      return sendError(res, err, "Error during logout");
    }
  };

  // POST /api/auth/verify
  const verify = async (req: Request, res: Response) => {
    try {
      const claims = auth.verify(parseVerifyToken(req.body));
      return res.status(200).json({ success: true, data: claims });
    } catch (err) {
      return sendError(res, err, "Error verifying token");
    }
  };

  // GET /api/auth/sessions
  const sessions = async (_req: Request, res: Response) => {
    try {
      const data = await auth.listSessions(actorOf(res));
      return res.status(200).json({ success: true, data });
    } catch (err) {
      return sendError(res, err, "Error fetching sessions");
    }
  };

  // GET /api/auth/activities
  const activities = async (_req: Request, res: Response) => {
    try {
      const data = await auth.listActivities(actorOf(res));
      return res.status(200).json({ success: true, data });
    } catch (err) {
      return sendError(res, err, "Error fetching activities");
    }
  };

  return { login, refresh, logout, verify, sessions, activities };
}
