// src/services/booking/bookingEngine.ts
import { randomBytes } from "crypto";
import {
  AvailabilityError,
  ConflictError,
  InvalidTransitionError,
  NotFoundError,
  PermissionError,
  ValidationError,
} from "../../errors";
import type { IAppointment } from "../../models/Appointments";
import type { IAppointmentHistory } from "../../models/AppointmentHistory";
import type { IDoctor } from "../../models/Doctors";
import { calendarDate, dayOfWeek, formatClock, parseCalendarDate, parseClock } from "../../utils/time";
import { isStaff, type Actor } from "../auth/types";
import { appointmentInterval, availableSegments, contains, overlaps, subtract, type Interval } from "./intervals";
import {
  ALLOWED_TRANSITIONS,
  type AppointmentFilter,
  type AppointmentNotifier,
  type BookingStore,
  type FreeInterval,
  type StatusPatch,
  type TargetStatus,
} from "./types";
import type { AppointmentListQuery, BookingRequest } from "./validation";

export interface BookingEngineOptions {
  store: BookingStore;
  notifier?: AppointmentNotifier;
  now?: () => Date;
  newAppointmentId?: () => string;
}

const generateAppointmentId = () => `APT-${randomBytes(6).toString("hex").toUpperCase()}`;

const HISTORY_ACTION: Record<TargetStatus, IAppointmentHistory["action"]> = {
  completed: "completed",
  cancelled: "cancelled",
  no_show: "no_show",
};

export class BookingEngine {
  private readonly store: BookingStore;
  private readonly notifier: AppointmentNotifier | null;
  private readonly now: () => Date;
  private readonly newAppointmentId: () => string;

  constructor(options: BookingEngineOptions) {
    this.store = options.store;
    this.notifier = options.notifier ?? null;
    this.now = options.now ?? (() => new Date());
    this.newAppointmentId = options.newAppointmentId ?? generateAppointmentId;
  }

  /**
   * Books `request` for the actor. The overlap check and the insert run
   * inside one doctor/day unit of work, so of two overlapping requests
   * exactly one is persisted.
   */
  async book(request: BookingRequest, actor: Actor): Promise<IAppointment> {
    const requested = requestedInterval(request);
    const day = parseCalendarDate(request.date);
    if (!day) {
      throw new ValidationError("Invalid booking request", [{ field: "date", message: "must be a valid date" }]);
    }

    const now = this.now();
    if (request.date < calendarDate(now)) {
      throw new ValidationError("Invalid booking request", [{ field: "date", message: "cannot be in the past" }]);
    }
    assertMayBookFor(actor, request.patient_id);
    await this.requireActiveDoctor(request.doctor_id);

    const windows = await this.store.listAvailability(request.doctor_id, dayOfWeek(day));
    if (!availableSegments(windows).some((segment) => contains(segment, requested))) {
      throw new AvailabilityError(
        `Doctor ${request.doctor_id} is not available from ${formatClock(requested.start)} to ${formatClock(requested.end)} on ${request.date}`
      );
    }

    const appointment = await this.store.withDoctorDay(request.doctor_id, request.date, async (tx) => {
      const existing = await tx.listActiveAppointments();
      const clash = existing.find((a) => overlaps(appointmentInterval(a), requested));
      if (clash) {
        throw new ConflictError(
          `This appointment overlaps with an existing appointment from ${clash.time_start} to ${clash.time_end}`
        );
      }

      const record: IAppointment = {
        appointment_id: this.newAppointmentId(),
        patient_id: request.patient_id,
        doctor_id: request.doctor_id,
        appointment_date: request.date,
        time_start: formatClock(requested.start),
        time_end: formatClock(requested.end),
        duration_minutes: request.duration_minutes,
        appointment_type: request.appointment_type,
        status: "scheduled",
        reason: request.reason,
        created_by: actor.user_id,
        cancelled_at: null,
        cancelled_by: null,
        cancellation_reason: null,
        completed_at: null,
        no_show_at: null,
        created_at: now,
        updated_at: now,
      };
      await tx.insertAppointment(record);
      await tx.appendHistory({
        appointment_id: record.appointment_id,
        action: "created",
        old_status: null,
        new_status: "scheduled",
        reason: request.reason,
        performed_by: actor.user_id,
        timestamp: now,
      });
      return record;
    });

    console.log(
      `Appointment ${appointment.appointment_id} booked with ${appointment.doctor_id} on ${appointment.appointment_date} ${appointment.time_start}-${appointment.time_end}`
    );
    this.dispatch(`booking confirmation for appointment ${appointment.appointment_id}`, (n) =>
      n.appointmentBooked(appointment)
    );
    return appointment;
  }

  async transition(
    appointmentId: string,
    newStatus: TargetStatus,
    actor: Actor,
    reason = ""
  ): Promise<IAppointment> {
    const current = await this.store.findAppointment(appointmentId);
    if (!current) throw new NotFoundError("Appointment not found");

    // Permission first, so callers without access learn nothing about the status.
    assertMayTransition(actor, current, newStatus);
    if (!ALLOWED_TRANSITIONS[current.status].includes(newStatus)) {
      throw new InvalidTransitionError(`Cannot change appointment status from ${current.status} to ${newStatus}`);
    }

    const now = this.now();
    const patch: StatusPatch = { status: newStatus, updated_at: now };
    if (newStatus === "cancelled") {
      patch.cancelled_at = now;
      patch.cancelled_by = actor.role;
      patch.cancellation_reason = reason;
    } else if (newStatus === "completed") {
      patch.completed_at = now;
    } else {
      patch.no_show_at = now;
    }

    const updated = await this.store.transitionStatus(appointmentId, current.status, patch, {
      appointment_id: appointmentId,
      action: HISTORY_ACTION[newStatus],
      old_status: current.status,
      new_status: newStatus,
      reason,
      performed_by: actor.user_id,
      timestamp: now,
    });
    if (!updated) {
      // Lost a race with another transition; report against the state that won.
      const latest = await this.store.findAppointment(appointmentId);
      throw new InvalidTransitionError(
        `Cannot change appointment status from ${latest ? latest.status : "unknown"} to ${newStatus}`
      );
    }

    console.log(`Appointment ${appointmentId} ${current.status} -> ${newStatus} by ${actor.user_id}`);
    this.dispatch(`status notification for appointment ${appointmentId}`, (n) =>
      n.appointmentStatusChanged(updated, current.status)
    );
    return updated;
  }

  /** Ordered, disjoint free intervals for the doctor's day. No side effects. */
  async checkAvailability(doctorId: string, date: string): Promise<FreeInterval[]> {
    const day = parseCalendarDate(date);
    if (!day) {
      throw new ValidationError("Invalid availability query", [{ field: "date", message: "must be a valid date" }]);
    }
    await this.requireActiveDoctor(doctorId);

    const [windows, booked] = await Promise.all([
      this.store.listAvailability(doctorId, dayOfWeek(day)),
      this.store.listActiveAppointments(doctorId, date),
    ]);

    return subtract(availableSegments(windows), booked.map(appointmentInterval)).map((interval) => ({
      start: formatClock(interval.start),
      end: formatClock(interval.end),
    }));
  }

  async getAppointment(appointmentId: string, actor: Actor): Promise<IAppointment> {
    const appointment = await this.store.findAppointment(appointmentId);
    if (!appointment) throw new NotFoundError("Appointment not found");
    if (!isStaff(actor) && !isParticipant(actor, appointment)) {
      throw new PermissionError("You do not have access to this appointment");
    }
    return appointment;
  }

  /**
   * Staff see every appointment, doctors and patients only their own. Roles
   * with no profile link see nothing.
   */
  async listAppointments(actor: Actor, query: AppointmentListQuery = {}): Promise<IAppointment[]> {
    const filter: AppointmentFilter = { date: query.date, status: query.status };
    if (!isStaff(actor)) {
      if (actor.profile_id === null) return [];
      if (actor.role === "doctor") filter.doctor_id = actor.profile_id;
      else if (actor.role === "patient") filter.patient_id = actor.profile_id;
      else return [];
    }
    return this.store.listAppointments(filter);
  }

  private async requireActiveDoctor(doctorId: string): Promise<IDoctor> {
    const doctor = await this.store.findDoctor(doctorId);
    if (!doctor || !doctor.is_active) {
      throw new ValidationError("Doctor not found or inactive", [
        { field: "doctor_id", message: "must reference an active doctor" },
      ]);
    }
    return doctor;
  }

  // Notifications never affect the outcome of the operation that triggered them.
  private dispatch(label: string, send: (notifier: AppointmentNotifier) => Promise<void>): void {
    const notifier = this.notifier;
    if (!notifier) return;
    void Promise.resolve()
      .then(() => send(notifier))
      .catch((err: unknown) => {
        console.error(`Failed to send ${label}:`, err);
      });
  }
}

function requestedInterval(request: BookingRequest): Interval {
  const start = parseClock(request.time_start);
  if (start === null || !Number.isInteger(request.duration_minutes) || request.duration_minutes <= 0) {
    throw new ValidationError("Invalid booking request", [
      { field: "time_start", message: "must be a time in HH:mm format with a positive duration" },
    ]);
  }
  return { start, end: start + request.duration_minutes };
}

function isParticipant(actor: Actor, appointment: IAppointment): boolean {
  if (actor.profile_id === null) return false;
  return (
    (actor.role === "doctor" && actor.profile_id === appointment.doctor_id) ||
    (actor.role === "patient" && actor.profile_id === appointment.patient_id)
  );
}

function assertMayBookFor(actor: Actor, patientId: string): void {
  if (isStaff(actor) || actor.role === "doctor") return;
  if (actor.role === "patient" && actor.profile_id === patientId) return;
  throw new PermissionError("You may only book appointments for yourself");
}

function assertMayTransition(actor: Actor, appointment: IAppointment, newStatus: TargetStatus): void {
  if (isStaff(actor)) return;
  if (actor.role === "doctor" && actor.profile_id === appointment.doctor_id) return;
  if (newStatus === "cancelled" && actor.role === "patient" && actor.profile_id === appointment.patient_id) return;

  const action: Record<TargetStatus, string> = {
    completed: "complete",
    cancelled: "cancel",
    no_show: "mark as no-show",
  };
  throw new PermissionError(`You are not allowed to ${action[newStatus]} this appointment`);
}
