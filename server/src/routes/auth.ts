// src/routes/auth.ts
import { RequestHandler, Router } from "express";
import type { createAuthController } from "../controllers/auth";

export function createAuthRoutes(
  controller: ReturnType<typeof createAuthController>,
  requireAuth: RequestHandler
): Router {
  const router = Router();

  // POST /api/auth/login
  router.post("/login", controller.login);
  router.post("/refresh", controller.refresh);
  router.post("/logout", controller.logout);
  router.post("/verify", controller.verify);

  router.get("/sessions", requireAuth, controller.sessions);
  router.get("/activities", requireAuth, controller.activities);

  return router;
}
