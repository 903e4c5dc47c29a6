// src/app.ts
import express, { Application, NextFunction, Request, Response } from "express";
import cors from "cors";

import { createAuthController } from "./controllers/auth";
import { createAppointmentsController } from "./controllers/appointmentsController";
import { sendError } from "./controllers/respond";
import { ValidationError } from "./errors";
import { requireAuth } from "./middleware/requireAuth";
import { createAuthRoutes } from "./routes/auth";
import { createAppointmentsRoutes } from "./routes/appointmentsRoutes";
import type { AuthService } from "./services/auth/authService";
import type { BookingEngine } from "./services/booking/bookingEngine";

export interface AppServices {
  auth: AuthService;
  booking: BookingEngine;
}

export interface AppOptions {
  corsOrigin: string;
}

const isBodyParseError = (err: unknown) =>
  typeof err === "object" && err !== null && "type" in err && err.type === "entity.parse.failed";

/**
 * Express application over already-constructed services. The entry point
 * wires mongoose stores in; tests wire in-memory ones.
 */
export function createApp(services: AppServices, options: AppOptions): Application {
  const app: Application = express();

  // Middleware
  app.use(cors({ origin: options.corsOrigin }));
  app.use(express.json());

  // Routes
  const authenticate = requireAuth(services.auth);
  app.use("/api/auth", createAuthRoutes(createAuthController(services.auth), authenticate));
  app.use("/api/appointments", createAppointmentsRoutes(createAppointmentsController(services.booking), authenticate));

  // Test route
  app.get("/", (_req: Request, res: Response) => {
    res.send("API is running...");
  });

  // Error handling
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) {
      sendError(res, new ValidationError("Request body is not valid JSON"), "Malformed request");
      return;
    }
    sendError(res, err, "Unhandled error");
  });

  return app;
}
