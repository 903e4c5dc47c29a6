// src/controllers/appointmentsController.ts
import { Request, Response } from "express";
import { actorOf } from "../middleware/requireAuth";
import type { Actor } from "../services/auth/types";
import type { BookingEngine } from "../services/booking/bookingEngine";
import {
  parseAppointmentListQuery,
  parseAvailabilityQuery,
  parseBookingRequest,
  parseTransitionRequest,
} from "../services/booking/validation";
import { sendError } from "./respond";

// Patients book for themselves unless the body says otherwise.
function withDefaultPatient(body: unknown, actor: Actor): unknown {
  if (
    actor.role === "patient" &&
    actor.profile_id !== null &&
    typeof body === "object" &&
    body !== null &&
    !("patient_id" in body)
  ) {
    return { ...body, patient_id: actor.profile_id };
  }
  return body;
}

export function createAppointmentsController(engine: BookingEngine) {
  // GET /api/appointments/availability?doctor_id=&date=
  const checkAvailability = async (req: Request, res: Response) => {
    try {
      const { doctor_id, date } = parseAvailabilityQuery(req.query);
      const slots = await engine.checkAvailability(doctor_id, date);
      return res.status(200).json({ success: true, data: { doctor_id, date, available: slots } });
    } catch (error) {
      return sendError(res, error, "Error checking availability");
    }
  };

  // GET /api/appointments?date=&status=
  const listAppointments = async (req: Request, res: Response) => {
    try {
      const appointments = await engine.listAppointments(actorOf(res), parseAppointmentListQuery(req.query));
      return res.status(200).json({ success: true, data: appointments });
    } catch (error) {
      return sendError(res, error, "Error fetching appointments");
    }
  };

  // POST /api/appointments
  const bookAppointment = async (req: Request, res: Response) => {
    try {
      const actor = actorOf(res);
      const request = parseBookingRequest(withDefaultPatient(req.body, actor));
      const appointment = await engine.book(request, actor);
      return res.status(201).json({ success: true, data: appointment });
    } catch (error) {
      return sendError(res, error, "Error booking appointment");
    }
  };

  // GET /api/appointments/:appointment_id
  const getAppointment = async (req: Request, res: Response) => {
    try {
      const appointment = await engine.getAppointment(req.params.appointment_id, actorOf(res));
      return res.status(200).json({ success: true, data: appointment });
    } catch (error) {
      return sendError(res, error, "Error fetching appointment");
    }
  };

  // PUT /api/appointments/:appointment_id/status
  const updateAppointmentStatus = async (req: Request, res: Response) => {
    try {
      const { appointment_id } = req.params;
      const { status, reason } = parseTransitionRequest(req.body);
      const updated = await engine.transition(appointment_id, status, actorOf(res), reason);
      return res.status(200).json({
        success: true,
        data: updated,
        message: `Appointment ${status.replace("_", "-")} successfully`,
      });
    } catch (error) {
      return sendError(res, error, "Error updating appointment status");
    }
  };

  return { checkAvailability, listAppointments, bookAppointment, getAppointment, updateAppointmentStatus };
}
