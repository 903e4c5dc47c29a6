// src/models/AppointmentHistory.ts
import mongoose, { Schema } from "mongoose";
import { APPOINTMENT_STATUSES, type AppointmentStatus } from "./Appointments";

export type AppointmentAction = "created" | "cancelled" | "completed" | "no_show";

export interface IAppointmentHistory {
  appointment_id: string;
  action: AppointmentAction;
  old_status: AppointmentStatus | null;
  new_status: AppointmentStatus;
  reason: string;
  performed_by: string; // user_id
  timestamp: Date;
}

const AppointmentHistorySchema = new Schema<IAppointmentHistory>({
  appointment_id: { type: String, required: true, ref: "Appointment" },
  action: { type: String, enum: ["created", "cancelled", "completed", "no_show"], required: true },
  old_status: { type: String, enum: [...APPOINTMENT_STATUSES, null], default: null },
  new_status: { type: String, enum: [...APPOINTMENT_STATUSES], required: true },
  reason: { type: String, default: "" },
  performed_by: { type: String, required: true, ref: "User" },
  timestamp: { type: Date, required: true },
});

AppointmentHistorySchema.index({ appointment_id: 1, timestamp: -1 });

export const AppointmentHistory = mongoose.model<IAppointmentHistory>(
  "AppointmentHistory",
  AppointmentHistorySchema,
  "appointment_history"
);
