// src/models/DoctorScheduleLock.ts
import mongoose, { Schema } from "mongoose";

/**
 * One document per doctor and day. Booking transactions increment `version`
 * before reading the day's appointments, so two transactions booking the same
 * doctor/day write the same document and the store aborts one of them.
 */
export interface IDoctorScheduleLock {
  doctor_id: string;
  appointment_date: string; // YYYY-MM-DD
  version: number;
}

const DoctorScheduleLockSchema = new Schema<IDoctorScheduleLock>({
  doctor_id: { type: String, required: true },
  appointment_date: { type: String, required: true },
  version: { type: Number, default: 0 },
});

DoctorScheduleLockSchema.index({ doctor_id: 1, appointment_date: 1 }, { unique: true });

export const DoctorScheduleLock = mongoose.model<IDoctorScheduleLock>(
  "DoctorScheduleLock",
  DoctorScheduleLockSchema,
  "doctor_schedule_locks"
);
