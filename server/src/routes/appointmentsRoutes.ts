import express, { RequestHandler } from "express";
import type { createAppointmentsController } from "../controllers/appointmentsController";

export function createAppointmentsRoutes(
  controller: ReturnType<typeof createAppointmentsController>,
  requireAuth: RequestHandler
): express.Router {
  const router = express.Router();

  router.use(requireAuth);

  // Must be registered before /:appointment_id
  router.get("/availability", controller.checkAvailability);
  router.get("/", controller.listAppointments);
  router.post("/", controller.bookAppointment);
  router.get("/:appointment_id", controller.getAppointment);

  // Update single appointment status by appointment_id
  router.put("/:appointment_id/status", controller.updateAppointmentStatus);

  return router;
}
