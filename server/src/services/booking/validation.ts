// src/services/booking/validation.ts
import { z } from "zod";
import { APPOINTMENT_STATUSES } from "../../models/Appointments";
import { MINUTES_PER_DAY, parseCalendarDate, parseClock } from "../../utils/time";
import { parseWith } from "../../utils/validation";

const id = (field: string) => z.string().trim().min(1, `${field} is required`).max(64);

const calendarDate = z
  .string()
  .refine((value) => parseCalendarDate(value) !== null, "must be a valid date in YYYY-MM-DD format");

const clockTime = z.string().refine((value) => parseClock(value) !== null, "must be a time in HH:mm format");

const BookingRequestSchema = z
  .object({
    doctor_id: id("doctor_id"),
    patient_id: id("patient_id"),
    date: calendarDate,
    time_start: clockTime,
    duration_minutes: z.number().int().min(5).max(480).default(30),
    reason: z.string().trim().min(1, "reason is required").max(1000),
    appointment_type: z
      .string()
      .trim()
      .min(1)
      .max(64)
      .nullish()
      .transform((value) => value ?? null),
  })
  .superRefine((value, ctx) => {
    const start = parseClock(value.time_start);
    if (start !== null && start + value.duration_minutes > MINUTES_PER_DAY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["duration_minutes"],
        message: "appointment must end by midnight",
      });
    }
  });

const TransitionRequestSchema = z.object({
  status: z.enum(["completed", "cancelled", "no_show"]),
  reason: z.string().trim().max(1000).default(""),
});

const AvailabilityQuerySchema = z.object({
  doctor_id: id("doctor_id"),
  date: calendarDate,
});

const AppointmentListQuerySchema = z.object({
  date: calendarDate.optional(),
  status: z.enum(APPOINTMENT_STATUSES).optional(),
});

export type BookingRequest = z.output<typeof BookingRequestSchema>;
export type TransitionRequest = z.output<typeof TransitionRequestSchema>;
export type AvailabilityQuery = z.output<typeof AvailabilityQuerySchema>;
export type AppointmentListQuery = z.output<typeof AppointmentListQuerySchema>;

export function parseBookingRequest(input: unknown): BookingRequest {
  return parseWith(BookingRequestSchema, input, "Invalid booking request");
}

export function parseTransitionRequest(input: unknown): TransitionRequest {
  return parseWith(TransitionRequestSchema, input, "Invalid or missing status");
}

export function parseAvailabilityQuery(input: unknown): AvailabilityQuery {
  return parseWith(AvailabilityQuerySchema, input, "doctor_id and date parameters are required");
}

export function parseAppointmentListQuery(input: unknown): AppointmentListQuery {
  return parseWith(AppointmentListQuerySchema, input, "Invalid appointment filters");
}
