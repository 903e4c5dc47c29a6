// src/models/Appointments.ts
import mongoose, { Schema } from "mongoose";

export const APPOINTMENT_STATUSES = ["scheduled", "completed", "cancelled", "no_show"] as const;
export type AppointmentStatus = (typeof APPOINTMENT_STATUSES)[number];

export interface IAppointment {
  appointment_id: string; // APT-<12 hex>
  patient_id: string; // FK -> Patient
  doctor_id: string; // FK -> Doctor
  appointment_date: string; // YYYY-MM-DD
  time_start: string; // HH:mm
  time_end: string; // HH:mm, exclusive
  duration_minutes: number;
  appointment_type: string | null;
  status: AppointmentStatus;
  reason: string;
  created_by: string; // user_id of the booking actor
  cancelled_at: Date | null;
  cancelled_by: string | null;
  cancellation_reason: string | null;
  completed_at: Date | null;
  no_show_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

const AppointmentSchema = new Schema<IAppointment>(
  {
    appointment_id: { type: String, required: true, unique: true },
    patient_id: { type: String, required: true, ref: "Patient" },
    doctor_id: { type: String, required: true, ref: "Doctor" },
    appointment_date: { type: String, required: true },
    time_start: { type: String, required: true },
    time_end: { type: String, required: true },
    duration_minutes: { type: Number, required: true, min: 1 },
    appointment_type: { type: String, default: null },
    status: {
      type: String,
      enum: [...APPOINTMENT_STATUSES],
      default: "scheduled",
      required: true,
    },
    reason: { type: String, required: true, maxlength: 1000 },
    created_by: { type: String, required: true, ref: "User" },
    cancelled_at: { type: Date, default: null },
    cancelled_by: { type: String, default: null },
    cancellation_reason: { type: String, default: null },
    completed_at: { type: Date, default: null },
    no_show_at: { type: Date, default: null },
  },
  { timestamps: { createdAt: "created_at", updatedAt: "updated_at" } }
);

// Conflict checks always scan one doctor's day, filtered by status.
AppointmentSchema.index({ doctor_id: 1, appointment_date: 1, status: 1 });
AppointmentSchema.index({ patient_id: 1, appointment_date: 1 });

export const Appointment = mongoose.model<IAppointment>(
  "Appointment",
  AppointmentSchema,
  "appointments"
);
